// Debug-namespace logging.
//
// Namespaces are enabled by a pattern list in the style of npm's debug
// package, taken from configuration or the DEBUG environment variable.
// Output is structured objects on console.log.

import { isShapewireError } from "@shapewire/codec";
import type { CodecCall, CodecContext, CodecMiddleware, CodecOutcome } from "./middleware.ts";
import { ExtensionKey } from "./middleware.ts";

const START_TIME = new ExtensionKey<number>("logging:start-time");

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 *
 * @param debug - Pattern list; defaults to `process.env.DEBUG`
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

// ============================================================================
// Loggers
// ============================================================================

export interface LoggerOptions {
  /** Pattern list; when unset, `process.env.DEBUG` is read on every call */
  debug?: string;
}

export interface Logger {
  readonly namespace: string;
  enabled(): boolean;
  log(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const enabled = (): boolean => isEnabled(namespace, options.debug);
  return {
    namespace,
    enabled,
    log(message, data) {
      if (!enabled()) return;
      if (data === undefined) {
        console.log(`${namespace} ${message}`);
      } else {
        console.log(`${namespace} ${message}`, data);
      }
    },
  };
}

// ============================================================================
// Middleware
// ============================================================================

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "shapewire:calls".
   */
  namespace?: string;

  /**
   * Pattern list. Defaults to `process.env.DEBUG`.
   */
  debug?: string;

  /**
   * Log call payloads (typed input, or the response). Defaults to false.
   */
  logPayload?: boolean;

  /**
   * Log results (the wire request, or the parsed value). Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Faster calls are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Create a middleware that logs every codec call with timing information.
 *
 * ```sh
 * DEBUG='shapewire:*' node app.js
 * ```
 *
 * Logs structured objects:
 * - Before: { type: "call", operation, direction, payload? }
 * - After: { type: "result", operation, direction, duration, ok, result?, error?, errorCode? }
 *
 * @example
 * ```typescript
 * const codec = operationCodec({ ... }).with(loggingMiddleware({ logPayload: true }));
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): CodecMiddleware {
  const namespace = options.namespace ?? "shapewire:calls";
  const logPayload = options.logPayload ?? false;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;
  const enabled = (): boolean => isEnabled(namespace, options.debug);

  return {
    pre(ctx: CodecContext, call: CodecCall): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "call",
        operation: call.operation,
        direction: call.direction,
      };
      if (logPayload) {
        logObj.payload = call.payload;
      }

      console.log(`→ ${call.direction} ${call.operation}`, logObj);
    },

    post(ctx: CodecContext, call: CodecCall, outcome: CodecOutcome): void {
      const startTime = ctx.extensions.get(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "result",
        operation: call.operation,
        direction: call.direction,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logResults && outcome.value !== undefined) {
          logObj.result = outcome.value;
        }
        console.log(`← ${call.direction} ${call.operation}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      const error = outcome.error;
      logObj.error = { name: error.name, message: error.message };
      if (isShapewireError(error)) {
        logObj.errorCode = error.code;
      }
      console.log(`← ${call.direction} ${call.operation}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
