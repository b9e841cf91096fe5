// Wire Type Registry: scalar encoders and decoders.
//
// Each scalar wire type maps to a pair of pure functions. Encoding produces
// wire text plus the form the text takes in a structured document (JSON
// string, number or boolean). Decoding accepts either a scalar token from a
// structured document or bare text from a header or query string.

import { DecodeError, EncodeError } from "./errors.ts";
import type { DateFormat, PrimitiveKind, ScalarType, WireScalar } from "./schema.ts";
import type { ScalarToken } from "./tokens.ts";

export type ScalarForm = "string" | "number" | "boolean";

export interface EncodedScalar {
  readonly text: string;
  readonly form: ScalarForm;
}

/**
 * Wire text to decode. `text` is untyped input (headers, query strings);
 * the other forms come from scalar tokens of a structured document.
 */
export interface RawScalar {
  readonly text: string;
  readonly form: ScalarForm | "text";
}

interface ScalarCodec {
  encode(value: unknown, type: ScalarType): EncodedScalar;
  decode(raw: RawScalar, type: ScalarType): WireScalar;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_TEXT = /^-?\d+$/;
const DECIMAL_TEXT = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const BASE64_TEXT = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const ISO8601_TEXT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;
const RFC822_TEXT = /^(?:[A-Z][a-z]{2}, )?\d{1,2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} (?:GMT|UTC)$/;

const SPECIAL_FLOATS = new Map<string, number>([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
]);

// ============================================================================
// Primitive codecs
// ============================================================================

const stringCodec: ScalarCodec = {
  encode(value) {
    if (typeof value !== "string") throw mismatch(value, "string");
    return { text: value, form: "string" };
  },
  decode(raw) {
    expectForm(raw, "string", ["string", "text"]);
    return raw.text;
  },
};

const integerCodec: ScalarCodec = {
  encode(value) {
    if (typeof value !== "number" || !Number.isInteger(value)) throw mismatch(value, "integer");
    if (value < INT32_MIN || value > INT32_MAX) {
      throw new EncodeError(`integer out of 32-bit range: ${value}`);
    }
    return { text: String(value), form: "number" };
  },
  decode(raw) {
    expectForm(raw, "integer", ["number", "text"]);
    if (!INTEGER_TEXT.test(raw.text)) {
      throw new DecodeError(`not an integer: ${JSON.stringify(raw.text)}`);
    }
    const value = Number(raw.text);
    if (value < INT32_MIN || value > INT32_MAX) {
      throw new DecodeError(`integer out of 32-bit range: ${raw.text}`);
    }
    return value;
  },
};

const longCodec: ScalarCodec = {
  encode(value) {
    if (typeof value === "bigint") {
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new EncodeError(`long out of 64-bit range: ${value}`);
      }
      return { text: value.toString(), form: "number" };
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
      return { text: String(value), form: "number" };
    }
    throw mismatch(value, "long");
  },
  decode(raw) {
    expectForm(raw, "long", ["number", "text"]);
    if (!INTEGER_TEXT.test(raw.text)) {
      throw new DecodeError(`not an integer: ${JSON.stringify(raw.text)}`);
    }
    const value = BigInt(raw.text);
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new DecodeError(`long out of 64-bit range: ${raw.text}`);
    }
    return value;
  },
};

function floatingCodec(kind: "double" | "float"): ScalarCodec {
  return {
    encode(value) {
      if (typeof value !== "number") throw mismatch(value, kind);
      if (Number.isFinite(value)) return { text: String(value), form: "number" };
      // JSON has no literal for these; services exchange them as strings.
      return { text: String(value), form: "string" };
    },
    decode(raw) {
      const special = SPECIAL_FLOATS.get(raw.text);
      if (special !== undefined && raw.form !== "number") return special;
      expectForm(raw, kind, ["number", "text"]);
      if (!DECIMAL_TEXT.test(raw.text)) {
        throw new DecodeError(`not a number: ${JSON.stringify(raw.text)}`);
      }
      return Number(raw.text);
    },
  };
}

const booleanCodec: ScalarCodec = {
  encode(value) {
    if (typeof value !== "boolean") throw mismatch(value, "boolean");
    return { text: value ? "true" : "false", form: "boolean" };
  },
  decode(raw) {
    expectForm(raw, "boolean", ["boolean", "text"]);
    if (raw.text === "true") return true;
    if (raw.text === "false") return false;
    throw new DecodeError(`not a boolean: ${JSON.stringify(raw.text)}`);
  },
};

const blobCodec: ScalarCodec = {
  encode(value) {
    if (!(value instanceof Uint8Array)) throw mismatch(value, "blob");
    return { text: encodeBase64(value), form: "string" };
  },
  decode(raw) {
    expectForm(raw, "blob", ["string", "text"]);
    return decodeBase64(raw.text);
  },
};

const dateCodec: ScalarCodec = {
  encode(value, type) {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) throw mismatch(value, "date");
    return encodeDate(value, dateFormatOf(type));
  },
  decode(raw, type) {
    return decodeDate(raw, dateFormatOf(type));
  },
};

/** The dispatch table, one codec per scalar kind. */
const scalarCodecs: Readonly<Record<PrimitiveKind | "date", ScalarCodec>> = {
  string: stringCodec,
  integer: integerCodec,
  long: longCodec,
  double: floatingCodec("double"),
  float: floatingCodec("float"),
  boolean: booleanCodec,
  blob: blobCodec,
  date: dateCodec,
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Encode a value to wire text.
 *
 * @throws EncodeError if the value does not match the wire type
 */
export function encodeScalar(value: unknown, type: ScalarType): EncodedScalar {
  return scalarCodecs[type.kind].encode(value, type);
}

/**
 * Decode a scalar token or bare wire text.
 *
 * @throws DecodeError on invalid text or a token of the wrong form
 */
export function decodeScalar(input: ScalarToken | string, type: ScalarType): WireScalar {
  return scalarCodecs[type.kind].decode(toRawScalar(input), type);
}

export function toRawScalar(input: ScalarToken | string): RawScalar {
  if (typeof input === "string") return { text: input, form: "text" };
  switch (input.type) {
    case "string":
      return { text: input.value, form: "string" };
    case "number":
      return { text: input.text, form: "number" };
    case "boolean":
      return { text: input.value ? "true" : "false", form: "boolean" };
  }
}

// ============================================================================
// Dates
// ============================================================================

function dateFormatOf(type: ScalarType): DateFormat {
  if (type.kind !== "date") throw new EncodeError(`not a date type: ${type.kind}`);
  return type.format;
}

export function encodeDate(value: Date, format: DateFormat): EncodedScalar {
  switch (format) {
    case "iso8601":
      return { text: value.toISOString(), form: "string" };
    case "rfc822":
      return { text: value.toUTCString(), form: "string" };
    case "unixSeconds":
      return { text: String(value.getTime() / 1000), form: "number" };
    case "unixMillis":
      return { text: String(value.getTime()), form: "number" };
  }
}

export function decodeDate(raw: RawScalar, format: DateFormat): Date {
  switch (format) {
    case "iso8601":
      expectForm(raw, "date(iso8601)", ["string", "text"]);
      return parseDateText(raw.text, ISO8601_TEXT, format);
    case "rfc822":
      expectForm(raw, "date(rfc822)", ["string", "text"]);
      return parseDateText(raw.text, RFC822_TEXT, format);
    case "unixSeconds":
      return epochDate(Math.round(parseEpoch(raw, format) * 1000), raw, format);
    case "unixMillis":
      return epochDate(Math.round(parseEpoch(raw, format)), raw, format);
  }
}

function epochDate(millis: number, raw: RawScalar, format: DateFormat): Date {
  const date = new Date(millis);
  if (Number.isNaN(date.getTime())) {
    throw new DecodeError(`${format} timestamp out of range: ${raw.text}`);
  }
  return date;
}

function parseDateText(text: string, pattern: RegExp, format: DateFormat): Date {
  const millis = pattern.test(text) ? Date.parse(text) : Number.NaN;
  if (Number.isNaN(millis)) {
    throw new DecodeError(`not a ${format} timestamp: ${JSON.stringify(text)}`);
  }
  return new Date(millis);
}

function parseEpoch(raw: RawScalar, format: DateFormat): number {
  expectForm(raw, `date(${format})`, ["number", "text"]);
  if (!DECIMAL_TEXT.test(raw.text)) {
    throw new DecodeError(`not a ${format} timestamp: ${JSON.stringify(raw.text)}`);
  }
  return Number(raw.text);
}

// ============================================================================
// Base64
// ============================================================================

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/**
 * Decode standard, padded base64.
 *
 * Node's decoder silently drops characters outside the alphabet, so the text
 * is checked first.
 */
export function decodeBase64(text: string): Uint8Array {
  if (text.length % 4 !== 0 || !BASE64_TEXT.test(text)) {
    throw new DecodeError(`invalid base64: ${JSON.stringify(truncate(text))}`);
  }
  return new Uint8Array(Buffer.from(text, "base64"));
}

// ============================================================================
// Helpers
// ============================================================================

function expectForm(raw: RawScalar, expected: string, allowed: RawScalar["form"][]): void {
  if (!allowed.includes(raw.form)) {
    throw new DecodeError(`expected ${expected}, got ${raw.form} ${JSON.stringify(raw.text)}`);
  }
}

function mismatch(value: unknown, expected: string): EncodeError {
  return new EncodeError(`expected ${expected}, got ${describeValue(value)}`);
}

/** Short name of a value's runtime type, for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "invalid date" : "date";
  if (value instanceof Uint8Array) return "bytes";
  return typeof value;
}

function truncate(text: string): string {
  return text.length > 32 ? `${text.slice(0, 32)}...` : text;
}
