// Operation codecs.
//
// Pairs an operation descriptor with its input and output shapes. A codec
// marshalls typed input into a WireRequest and unmarshalls a WireResponse
// into the output shape; middleware composes with `with()`.

import { resolveShape } from "@shapewire/codec";
import type { ShapeRegistry, ShapeSchema, ShapeValue } from "@shapewire/codec";
import { marshallRequest } from "@shapewire/wire";
import type { OperationDescriptor, WireRequest } from "@shapewire/wire";
import type { ShapewireConfig } from "./config.ts";
import { parseConfig } from "./config.ts";
import { createLogger } from "./logging.ts";
import type { Logger } from "./logging.ts";
import type {
  CodecCall,
  CodecContext,
  CodecMiddleware,
  CodecOutcome,
  Direction,
} from "./middleware.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import { unmarshallResponse } from "./response.ts";
import type { WireResponse } from "./response.ts";

export interface OperationCodecInit {
  operation: OperationDescriptor;
  /** Input shape or its name in `registry` */
  input: ShapeSchema | string;
  /** Output shape or its name in `registry` */
  output: ShapeSchema | string;
  registry: ShapeRegistry;
  /** Validated with `parseConfig` */
  config?: ShapewireConfig;
}

interface Loggers {
  marshall: Logger;
  unmarshall: Logger;
  middleware: Logger;
}

/**
 * Codec for one operation.
 *
 * Middleware is applied in order: first added runs first on pre,
 * and last on post (onion model).
 */
export class OperationCodec {
  readonly operation: OperationDescriptor;
  readonly input: ShapeSchema;
  readonly output: ShapeSchema;
  readonly registry: ShapeRegistry;
  private readonly config: ShapewireConfig;
  private readonly middlewares: readonly CodecMiddleware[];
  private readonly log: Loggers;

  constructor(init: OperationCodecInit, middlewares: readonly CodecMiddleware[] = []) {
    this.operation = init.operation;
    this.registry = init.registry;
    this.input = typeof init.input === "string" ? resolveShape(init.input, init.registry) : init.input;
    this.output =
      typeof init.output === "string" ? resolveShape(init.output, init.registry) : init.output;
    this.config = parseConfig(init.config);
    this.middlewares = middlewares;
    const debug = this.config.debug;
    this.log = {
      marshall: createLogger("shapewire:marshall", { debug }),
      unmarshall: createLogger("shapewire:unmarshall", { debug }),
      middleware: createLogger("shapewire:middleware", { debug }),
    };
  }

  /**
   * Marshall typed input into a wire-ready request.
   *
   * @throws InvalidArgumentError, MarshallError or RejectionError
   */
  marshall(input: unknown): WireRequest {
    return this.run("marshall", input, (payload) => {
      const request = marshallRequest(payload, this.input, this.operation, this.registry, {
        idempotencyTokenProvider: this.config.idempotencyTokenProvider,
        headerListSeparator: this.config.headerListSeparator,
      });
      this.log.marshall.log("marshalled", {
        operation: this.operation.name,
        method: request.method,
        path: request.path,
        bodyBytes: request.body?.byteLength ?? 0,
      });
      return request;
    });
  }

  /**
   * Parse a response into the output shape.
   *
   * @throws InvalidArgumentError, ParseError or RejectionError
   */
  unmarshall(response: WireResponse): ShapeValue {
    return this.run("unmarshall", response, (payload) =>
      unmarshallResponse(payload, this.output, this.registry, {
        headerListSeparator: this.config.headerListSeparator,
        onUnknownField: (path, name) => {
          this.log.unmarshall.log("skipped unknown field", {
            operation: this.operation.name,
            path,
            name,
          });
        },
      }),
    );
  }

  /**
   * Wrap this codec with middleware.
   *
   * @returns New codec with the middleware applied after the existing ones
   */
  with(middleware: CodecMiddleware): OperationCodec {
    return new OperationCodec(
      {
        operation: this.operation,
        input: this.input,
        output: this.output,
        registry: this.registry,
        config: this.config,
      },
      [...this.middlewares, middleware],
    );
  }

  /**
   * Run `body` through the middleware lifecycle:
   * 1. Create context with extensions
   * 2. Run pre() hooks (can reject or replace the payload)
   * 3. Run the call
   * 4. Run post() hooks with the outcome
   * 5. Return the result or rethrow
   */
  private run<T>(direction: Direction, payload: unknown, body: (payload: unknown) => T): T {
    if (this.middlewares.length === 0) return body(payload);

    const ctx: CodecContext = { extensions: new Extensions() };
    const call: CodecCall = { operation: this.operation.name, direction, payload };

    for (const mw of this.middlewares) {
      const rejection = mw.pre?.(ctx, call);
      if (rejection) {
        const error = RejectionError.from(rejection);
        this.runPostHooks(ctx, call, { ok: false, error });
        throw error;
      }
    }

    let value: T;
    try {
      value = body(call.payload);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.runPostHooks(ctx, call, { ok: false, error });
      throw e;
    }

    this.runPostHooks(ctx, call, { ok: true, value });
    return value;
  }

  private runPostHooks(ctx: CodecContext, call: CodecCall, outcome: CodecOutcome): void {
    // Reverse order (onion model); a failing hook does not stop the others.
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (!mw.post) continue;
      try {
        mw.post(ctx, call, outcome);
      } catch (e) {
        this.log.middleware.log("post hook failed", {
          operation: call.operation,
          direction: call.direction,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }
}

export function operationCodec(init: OperationCodecInit): OperationCodec {
  return new OperationCodec(init);
}
