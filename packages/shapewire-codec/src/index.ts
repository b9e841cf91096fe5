// shapewire codec
//
// Binding descriptors, the Wire Type Registry, token streams and the
// Response Parsing Driver. Everything here is synchronous and pure apart
// from consuming the token stream it is handed.

// ============================================================================
// Errors
// ============================================================================

export {
  ErrorCode,
  ShapewireError,
  InvalidArgumentError,
  EncodeError,
  DecodeError,
  MarshallError,
  ParseError,
  isShapewireError,
  describeError,
  type ShapewireErrorOptions,
} from "./errors.ts";

// ============================================================================
// Schema
// ============================================================================

export type {
  WireLocation,
  DateFormat,
  PrimitiveKind,
  DateType,
  ScalarType,
  ListType,
  MapType,
  StructureType,
  WireType,
  BindingDescriptor,
  ShapeSchema,
  ShapeRegistry,
  WireScalar,
  WireValue,
  ShapeValue,
} from "./schema.ts";

export {
  isScalarType,
  resolveShape,
  payloadMembers,
  explicitPayloadMember,
  wireTypeToString,
  shapeRegistry,
  checkRegistry,
} from "./schema.ts";

export {
  defineShape,
  deepFreeze,
  formatIssues,
  WireTypeSchema,
  BindingDescriptorSchema,
} from "./define.ts";

// ============================================================================
// Wire Type Registry
// ============================================================================

export {
  encodeScalar,
  decodeScalar,
  toRawScalar,
  encodeDate,
  decodeDate,
  encodeBase64,
  decodeBase64,
  describeValue,
  type EncodedScalar,
  type RawScalar,
  type ScalarForm,
} from "./scalar.ts";

// ============================================================================
// Token Streams
// ============================================================================

export type { Token, TokenType, ScalarToken, TokenStream, JsonValue } from "./tokens.ts";
export {
  IteratorTokenStream,
  arrayTokenStream,
  tokensOf,
  isScalarToken,
  describeToken,
  START_OBJECT,
  END_OBJECT,
  START_ARRAY,
  END_ARRAY,
  NULL_TOKEN,
} from "./tokens.ts";
export { JsonTokenizer } from "./json_tokenizer.ts";

// ============================================================================
// Response Parsing Driver
// ============================================================================

export {
  unmarshall,
  unmarshallList,
  unmarshallValue,
  type ParseState,
  type UnmarshallOptions,
} from "./unmarshall.ts";
