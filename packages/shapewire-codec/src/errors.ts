// Error taxonomy shared by the marshalling and parsing drivers.
//
// Every failure surfaced to callers is a ShapewireError carrying a stable
// `code`. Field- and path-level detail lives on the subclass; the original
// failure is kept on `cause`.

/** Error discriminants */
export const ErrorCode = {
  /** Absent or malformed top-level argument; no work was performed */
  INVALID_ARGUMENT: "invalid_argument",
  /** A request field could not be encoded */
  MARSHALL: "marshall",
  /** A token stream was malformed, truncated or did not match the shape */
  PARSE: "parse",
  /** A scalar could not be decoded from its wire text */
  DECODE: "decode",
  /** A value did not match the wire type it was bound to */
  ENCODE: "encode",
  /** Middleware refused to run the call */
  REJECTED: "rejected",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ShapewireErrorOptions {
  cause?: unknown;
}

export class ShapewireError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: ShapewireErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ShapewireError";
    this.code = code;
  }
}

export class InvalidArgumentError extends ShapewireError {
  constructor(message: string, options: ShapewireErrorOptions = {}) {
    super(ErrorCode.INVALID_ARGUMENT, message, options);
    this.name = "InvalidArgumentError";
  }
}

/** Raised by the Wire Type Registry when a value does not fit its wire type. */
export class EncodeError extends ShapewireError {
  constructor(message: string) {
    super(ErrorCode.ENCODE, message);
    this.name = "EncodeError";
  }
}

/** Raised by the Wire Type Registry when wire text cannot become a value. */
export class DecodeError extends ShapewireError {
  constructor(message: string, options: ShapewireErrorOptions = {}) {
    super(ErrorCode.DECODE, message, options);
    this.name = "DecodeError";
  }
}

/**
 * Failure while writing one request field.
 *
 * `field` is the wire name of the failing member. Failures inside nested
 * structures are reported with a dotted path (`counters.total`).
 */
export class MarshallError extends ShapewireError {
  readonly field: string;

  constructor(field: string, cause: unknown) {
    super(ErrorCode.MARSHALL, `Unable to marshall field "${field}": ${describeError(cause)}`, {
      cause,
    });
    this.name = "MarshallError";
    this.field = field;
  }

  /**
   * Wrap a failure raised while writing `field`.
   *
   * A MarshallError coming from a nested member keeps its original cause and
   * gains `field` as a path prefix, so one call produces exactly one wrapper.
   */
  static wrap(field: string, error: unknown): MarshallError {
    if (error instanceof MarshallError) {
      return new MarshallError(`${field}.${error.field}`, error.cause);
    }
    return new MarshallError(field, error);
  }
}

export class ParseError extends ShapewireError {
  /** Member path at which parsing failed, `<root>` for the top level */
  readonly path: string;

  constructor(message: string, path = "<root>", options: ShapewireErrorOptions = {}) {
    super(ErrorCode.PARSE, `Parse error at ${path}: ${message}`, options);
    this.name = "ParseError";
    this.path = path;
  }
}

export function isShapewireError(value: unknown): value is ShapewireError {
  return value instanceof ShapewireError;
}

/** Human-readable message of an arbitrary thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
