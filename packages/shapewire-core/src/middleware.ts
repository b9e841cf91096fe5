// Codec middleware types.
//
// Middleware intercepts marshall and unmarshall calls, enabling patterns
// like input defaults, auditing, logging and rejecting calls outright.

import { ErrorCode, ShapewireError } from "@shapewire/codec";

/**
 * Typed key for Extensions.
 *
 * @example
 * ```typescript
 * const TENANT = new ExtensionKey<string>("tenant");
 * ctx.extensions.set(TENANT, "acme");
 * ctx.extensions.get(TENANT); // string | undefined
 * ```
 */
export class ExtensionKey<T> {
  /** Values stored under this key, per Extensions instance */
  readonly values = new WeakMap<Extensions, T>();

  constructor(readonly name: string) {}
}

/**
 * Per-call storage for middleware state, shared between the pre and post
 * hooks of one call.
 */
export class Extensions {
  set<T>(key: ExtensionKey<T>, value: T): void {
    key.values.set(this, value);
  }

  get<T>(key: ExtensionKey<T>): T | undefined {
    return key.values.get(this);
  }

  has<T>(key: ExtensionKey<T>): boolean {
    return key.values.has(this);
  }

  delete<T>(key: ExtensionKey<T>): boolean {
    return key.values.delete(this);
  }
}

export interface CodecContext {
  extensions: Extensions;
}

export type Direction = "marshall" | "unmarshall";

/**
 * One marshall or unmarshall call.
 *
 * `payload` is the typed input for marshall and the WireResponse for
 * unmarshall. Pre hooks may replace it.
 */
export interface CodecCall {
  readonly operation: string;
  readonly direction: Direction;
  payload: unknown;
}

export type CodecOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * Rejection returned by a pre hook to abort the call.
 */
export interface Rejection {
  reason: string;
  message: string;
}

export class RejectionError extends ShapewireError {
  readonly reason: string;

  constructor(rejection: Rejection) {
    super(ErrorCode.REJECTED, rejection.message);
    this.name = "RejectionError";
    this.reason = rejection.reason;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Codec middleware.
 *
 * Hooks are synchronous, like the codec itself. Pre hooks run in the order
 * middleware was added; post hooks run in reverse (onion model).
 *
 * @example
 * ```typescript
 * const START = new ExtensionKey<number>("start");
 * const timing: CodecMiddleware = {
 *   pre(ctx) {
 *     ctx.extensions.set(START, performance.now());
 *   },
 *   post(ctx, call) {
 *     const start = ctx.extensions.get(START) ?? 0;
 *     console.log(`${call.operation} took ${performance.now() - start}ms`);
 *   },
 * };
 * ```
 */
export interface CodecMiddleware {
  /**
   * Called before the call runs.
   *
   * @param ctx - Context with extensions storage
   * @param call - The call (payload is mutable)
   * @returns void to continue, Rejection to abort
   */
  pre?(ctx: CodecContext, call: CodecCall): Rejection | void;

  /**
   * Called after the call finished, whether it succeeded or not.
   *
   * @param ctx - Context with extensions storage
   * @param call - The call, for correlation
   * @param outcome - The call result or error
   */
  post?(ctx: CodecContext, call: CodecCall, outcome: CodecOutcome): void;
}
