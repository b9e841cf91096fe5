// Request builder and the immutable wire request it produces.
//
// A builder is owned by exactly one marshalling call. It starts from the
// operation's URI template, collects path substitutions, query entries and
// headers, and is finalized once into a frozen WireRequest.

/** A query entry. A `null` value is a bare flag (`?uploads`). */
export type QueryParam = readonly [name: string, value: string | null];

export interface WireRequest {
  /** Operation name, for correlation */
  readonly operation: string;
  readonly method: string;
  /** Path with every placeholder substituted and escaped */
  readonly path: string;
  /** Query entries in insertion order, static template entries first */
  readonly query: readonly QueryParam[];
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Uint8Array;
}

const PLACEHOLDER = /\{([^}]+)\}/g;

/**
 * Percent-encode everything outside RFC 3986's unreserved set.
 *
 * `encodeURIComponent` leaves `!'()*` alone; those are escaped too.
 */
export function escapeUriComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** Escape each segment of a greedy label, keeping the separators. */
export function escapeUriPath(value: string): string {
  return value.split("/").map(escapeUriComponent).join("/");
}

export class RequestBuilder {
  private path: string;
  private readonly query: QueryParam[] = [];
  /** Lower-cased name -> [name as first set, value] */
  private readonly headers = new Map<string, [string, string]>();

  constructor(
    readonly operation: string,
    readonly method: string,
    readonly requestUri: string,
  ) {
    const mark = requestUri.indexOf("?");
    this.path = mark === -1 ? requestUri : requestUri.slice(0, mark);
    if (mark !== -1) {
      for (const part of requestUri.slice(mark + 1).split("&")) {
        if (part === "") continue;
        const eq = part.indexOf("=");
        this.query.push(eq === -1 ? [part, null] : [part.slice(0, eq), part.slice(eq + 1)]);
      }
    }
  }

  /**
   * Replace the `{name}` placeholder (or `{name+}` when `greedy`) with the
   * escaped value.
   *
   * @returns false if the template has no such placeholder
   */
  substitutePath(name: string, value: string, greedy = false): boolean {
    const placeholder = greedy ? `{${name}+}` : `{${name}}`;
    if (!this.path.includes(placeholder)) return false;
    const escaped = greedy ? escapeUriPath(value) : escapeUriComponent(value);
    this.path = this.path.split(placeholder).join(escaped);
    return true;
  }

  /** Placeholder names still present in the path. */
  unresolvedPlaceholders(): string[] {
    return Array.from(this.path.matchAll(PLACEHOLDER), (match) => match[1].replace(/\+$/, ""));
  }

  addQuery(name: string, value: string): void {
    this.query.push([name, value]);
  }

  /** Set a header, replacing any value under the same name in any case. */
  setHeader(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.headers.get(key);
    this.headers.set(key, [existing?.[0] ?? name, value]);
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }

  build(body?: Uint8Array): WireRequest {
    const headers: Record<string, string> = {};
    for (const [name, value] of this.headers.values()) {
      headers[name] = value;
    }
    const request: WireRequest = {
      operation: this.operation,
      method: this.method,
      path: this.path,
      query: Object.freeze(this.query.slice()),
      headers: Object.freeze(headers),
      ...(body === undefined ? {} : { body }),
    };
    return Object.freeze(request);
  }
}

/** Render `path?query` with every query name and value escaped. */
export function requestUrl(request: WireRequest): string {
  if (request.query.length === 0) return request.path;
  const query = request.query
    .map(([name, value]) =>
      value === null ? escapeUriComponent(name) : `${escapeUriComponent(name)}=${escapeUriComponent(value)}`,
    )
    .join("&");
  return `${request.path}?${query}`;
}
