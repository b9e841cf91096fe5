// shapewire core
//
// Per-operation codecs with middleware, response unmarshalling, logging and
// configuration. Re-exports the codec and wire packages so clients need a
// single import.

export * from "@shapewire/codec";
export * from "@shapewire/wire";

// ============================================================================
// Operation Codecs
// ============================================================================

export { OperationCodec, operationCodec, type OperationCodecInit } from "./operation.ts";
export {
  unmarshallResponse,
  WireResponseSchema,
  type WireResponse,
  type UnmarshallResponseOptions,
} from "./response.ts";

// ============================================================================
// Middleware
// ============================================================================

export {
  Extensions,
  ExtensionKey,
  RejectionError,
  type CodecContext,
  type CodecCall,
  type CodecOutcome,
  type CodecMiddleware,
  type Direction,
  type Rejection,
} from "./middleware.ts";

// ============================================================================
// Logging
// ============================================================================

export {
  createLogger,
  isEnabled,
  matchPattern,
  loggingMiddleware,
  type Logger,
  type LoggerOptions,
  type LoggingOptions,
} from "./logging.ts";

// ============================================================================
// Configuration
// ============================================================================

export { ShapewireConfigSchema, parseConfig, configFromEnv, type ShapewireConfig } from "./config.ts";
