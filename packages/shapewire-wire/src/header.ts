// List-valued headers.
//
// Items are joined with a separator. An item that would not survive a split
// (it holds the separator or a quote, is empty, or has surrounding
// whitespace) is sent as a quoted string with `\` escapes.

export function joinHeaderList(items: readonly string[], separator: string): string {
  return items.map((item) => (needsQuotes(item, separator) ? quote(item) : item)).join(separator);
}

/**
 * Split a list-valued header. Unquoted items are trimmed and dropped when
 * empty; quoted items are kept exactly.
 */
export function splitHeaderList(text: string, separator: string): string[] {
  const items: string[] = [];
  let item = "";
  let quoted = false;
  let inQuotes = false;

  const push = (): void => {
    if (quoted) {
      items.push(item);
    } else if (item.trim() !== "") {
      items.push(item.trim());
    }
    item = "";
    quoted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === "\\" && i + 1 < text.length) {
        i++;
        item += text[i];
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        item += ch;
      }
      continue;
    }
    if (text.startsWith(separator, i)) {
      push();
      i += separator.length - 1;
      continue;
    }
    if (quoted) {
      // Whitespace after the closing quote.
      if (ch.trim() !== "") item += ch;
      continue;
    }
    if (ch === '"' && item.trim() === "") {
      item = "";
      quoted = true;
      inQuotes = true;
      continue;
    }
    item += ch;
  }
  push();
  return items;
}

function needsQuotes(item: string, separator: string): boolean {
  return item === "" || item.trim() !== item || item.includes(separator) || item.includes('"');
}

function quote(item: string): string {
  return `"${item.replace(/[\\"]/g, "\\$&")}"`;
}
