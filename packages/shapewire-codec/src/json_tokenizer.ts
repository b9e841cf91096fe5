// Streaming JSON tokenizer.
//
// Produces tokens on demand from JSON text. Grammar errors (bad literals,
// unterminated strings, misplaced separators) raise ParseError immediately.
// Running out of input is not an error here: the stream simply ends and the
// consumer decides whether it stopped in a terminal state.

import { ParseError } from "./errors.ts";
import type { Token, TokenStream } from "./tokens.ts";
import { END_ARRAY, END_OBJECT, NULL_TOKEN, START_ARRAY, START_OBJECT } from "./tokens.ts";

type Container = "object" | "array";

/**
 * What the tokenizer accepts next.
 *
 * - value: any value (top level, after a field name, after `,` in an array)
 * - keyOrEnd / valueOrEnd: first position inside `{` / `[`
 * - key: a field name, after `,` in an object
 * - separator: `,` or the closing bracket of the current container
 * - done: the top-level value is complete
 */
type Expect = "value" | "keyOrEnd" | "key" | "valueOrEnd" | "separator" | "done";

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

export class JsonTokenizer implements TokenStream {
  private readonly text: string;
  private pos = 0;
  private expect: Expect = "value";
  private readonly stack: Container[] = [];
  private lookahead: Token | undefined;
  private hasLookahead = false;

  constructor(input: string | Uint8Array) {
    this.text = typeof input === "string" ? input : decodeUtf8(input);
    if (this.text.charCodeAt(0) === 0xfeff) this.pos = 1;
  }

  next(): Token | undefined {
    if (this.hasLookahead) {
      this.hasLookahead = false;
      return this.lookahead;
    }
    return this.scan();
  }

  peek(): Token | undefined {
    if (!this.hasLookahead) {
      this.lookahead = this.scan();
      this.hasLookahead = true;
    }
    return this.lookahead;
  }

  /** Nesting depth after the last token produced. */
  get depth(): number {
    return this.stack.length;
  }

  private scan(): Token | undefined {
    this.skipWhitespace();
    if (this.pos >= this.text.length) return undefined;
    const ch = this.text[this.pos];

    switch (this.expect) {
      case "done":
        throw this.error(`unexpected ${JSON.stringify(ch)} after top-level value`);
      case "keyOrEnd":
        if (ch === "}") return this.close("object");
        return this.readKey();
      case "key":
        return this.readKey();
      case "valueOrEnd":
        if (ch === "]") return this.close("array");
        return this.readValue();
      case "value":
        return this.readValue();
      case "separator":
        return this.readSeparator(ch);
    }
  }

  private readSeparator(ch: string): Token | undefined {
    const top = this.stack[this.stack.length - 1];
    if (ch === ",") {
      this.pos++;
      this.expect = top === "object" ? "key" : "value";
      return this.scan();
    }
    if (ch === "}" && top === "object") return this.close("object");
    if (ch === "]" && top === "array") return this.close("array");
    throw this.error(`expected "," or end of ${top}, got ${JSON.stringify(ch)}`);
  }

  private readKey(): Token {
    if (this.text[this.pos] !== '"') {
      throw this.error(`expected field name, got ${JSON.stringify(this.text[this.pos])}`);
    }
    const name = this.readString();
    this.skipWhitespace();
    if (this.pos >= this.text.length) {
      // Truncated after the key; report the key and let the consumer hit the end.
      this.expect = "value";
      return { type: "fieldName", name };
    }
    if (this.text[this.pos] !== ":") {
      throw this.error(`expected ":" after field name ${JSON.stringify(name)}`);
    }
    this.pos++;
    this.expect = "value";
    return { type: "fieldName", name };
  }

  private readValue(): Token {
    const ch = this.text[this.pos];
    switch (ch) {
      case "{":
        this.pos++;
        this.stack.push("object");
        this.expect = "keyOrEnd";
        return START_OBJECT;
      case "[":
        this.pos++;
        this.stack.push("array");
        this.expect = "valueOrEnd";
        return START_ARRAY;
      case '"': {
        const value = this.readString();
        this.afterValue();
        return { type: "string", value };
      }
      case "t":
        this.readLiteral("true");
        return { type: "boolean", value: true };
      case "f":
        this.readLiteral("false");
        return { type: "boolean", value: false };
      case "n":
        this.readLiteral("null");
        return NULL_TOKEN;
      default:
        return this.readNumber();
    }
  }

  private readNumber(): Token {
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (match === null) {
      throw this.error(`unexpected ${JSON.stringify(this.text[this.pos])}`);
    }
    this.pos += match[0].length;
    this.afterValue();
    return { type: "number", text: match[0] };
  }

  private readLiteral(literal: string): void {
    if (!this.text.startsWith(literal, this.pos)) {
      throw this.error(`invalid literal, expected ${literal}`);
    }
    this.pos += literal.length;
    this.afterValue();
  }

  private readString(): string {
    // Opening quote
    this.pos++;
    let out = "";
    let chunkStart = this.pos;
    while (this.pos < this.text.length) {
      const code = this.text.charCodeAt(this.pos);
      if (code === 0x22) {
        out += this.text.slice(chunkStart, this.pos);
        this.pos++;
        return out;
      }
      if (code < 0x20) {
        throw this.error("unescaped control character in string");
      }
      if (code === 0x5c) {
        out += this.text.slice(chunkStart, this.pos);
        out += this.readEscape();
        chunkStart = this.pos;
        continue;
      }
      this.pos++;
    }
    throw this.error("unterminated string");
  }

  private readEscape(): string {
    const ch = this.text[this.pos + 1];
    if (ch === undefined) throw this.error("unterminated string");
    if (ch === "u") {
      const hex = this.text.slice(this.pos + 2, this.pos + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw this.error("invalid unicode escape");
      this.pos += 6;
      return String.fromCharCode(parseInt(hex, 16));
    }
    const escaped = ESCAPES[ch];
    if (escaped === undefined) throw this.error(`invalid escape \\${ch}`);
    this.pos += 2;
    return escaped;
  }

  private close(container: Container): Token {
    this.pos++;
    this.stack.pop();
    this.afterValue();
    return container === "object" ? END_OBJECT : END_ARRAY;
  }

  private afterValue(): void {
    this.expect = this.stack.length === 0 ? "done" : "separator";
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch !== " " && ch !== "\n" && ch !== "\r" && ch !== "\t") return;
      this.pos++;
    }
  }

  private error(message: string): ParseError {
    return new ParseError(`${message} (offset ${this.pos})`);
  }
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (e) {
    throw new ParseError("body is not valid UTF-8", "<root>", { cause: e });
  }
}
