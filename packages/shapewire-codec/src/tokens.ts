// Token streams: the format-agnostic input of the parsing driver.
//
// A token stream is lazy, finite and forward-only. It is not restartable and
// has exactly one consumer.

// ============================================================================
// Tokens
// ============================================================================

export type ScalarToken =
  | { readonly type: "string"; readonly value: string }
  /** Numbers keep their source text so longs survive without rounding. */
  | { readonly type: "number"; readonly text: string }
  | { readonly type: "boolean"; readonly value: boolean };

export type Token =
  | { readonly type: "startObject" }
  | { readonly type: "endObject" }
  | { readonly type: "startArray" }
  | { readonly type: "endArray" }
  | { readonly type: "fieldName"; readonly name: string }
  | { readonly type: "null" }
  | ScalarToken;

export type TokenType = Token["type"];

export interface TokenStream {
  /** Consume the next token. `undefined` once the stream is exhausted. */
  next(): Token | undefined;
  /** Look at the next token without consuming it. */
  peek(): Token | undefined;
}

export const START_OBJECT: Token = { type: "startObject" };
export const END_OBJECT: Token = { type: "endObject" };
export const START_ARRAY: Token = { type: "startArray" };
export const END_ARRAY: Token = { type: "endArray" };
export const NULL_TOKEN: Token = { type: "null" };

export function isScalarToken(token: Token): token is ScalarToken {
  return token.type === "string" || token.type === "number" || token.type === "boolean";
}

export function describeToken(token: Token | undefined): string {
  if (token === undefined) return "end of stream";
  switch (token.type) {
    case "fieldName":
      return `field name ${JSON.stringify(token.name)}`;
    case "string":
      return `string ${JSON.stringify(token.value)}`;
    case "number":
      return `number ${token.text}`;
    case "boolean":
      return `boolean ${token.value}`;
    default:
      return token.type;
  }
}

// ============================================================================
// Sources
// ============================================================================

/** Adapts any token iterator into a peekable TokenStream. */
export class IteratorTokenStream implements TokenStream {
  private lookahead: IteratorResult<Token> | null = null;

  constructor(private readonly source: Iterator<Token>) {}

  next(): Token | undefined {
    const result = this.lookahead ?? this.source.next();
    this.lookahead = null;
    return result.done === true ? undefined : result.value;
  }

  peek(): Token | undefined {
    if (this.lookahead === null) {
      this.lookahead = this.source.next();
    }
    return this.lookahead.done === true ? undefined : this.lookahead.value;
  }
}

export function arrayTokenStream(tokens: Iterable<Token>): TokenStream {
  return new IteratorTokenStream(tokens[Symbol.iterator]());
}

/** An already-parsed JSON document. Longs may be given as bigints. */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Token stream over an in-memory JSON value, produced lazily. */
export function tokensOf(value: JsonValue): TokenStream {
  return new IteratorTokenStream(walk(value));
}

function* walk(value: JsonValue): Generator<Token, void, undefined> {
  if (value === null) {
    yield NULL_TOKEN;
  } else if (typeof value === "boolean") {
    yield { type: "boolean", value };
  } else if (typeof value === "number" || typeof value === "bigint") {
    yield { type: "number", text: value.toString() };
  } else if (typeof value === "string") {
    yield { type: "string", value };
  } else if (Array.isArray(value)) {
    yield START_ARRAY;
    for (const item of value) {
      yield* walk(item);
    }
    yield END_ARRAY;
  } else {
    yield START_OBJECT;
    for (const [name, item] of Object.entries(value)) {
      yield { type: "fieldName", name };
      yield* walk(item);
    }
    yield END_OBJECT;
  }
}
