// Response Parsing Driver.
//
// Rebuilds typed value trees from a token stream, guided by binding tables.
// The driver is a small state machine over tokens:
//
//   ExpectStart  -> first token of a value
//   InObject     -> field names until endObject
//   InArray      -> elements until endArray
//   ExpectScalar -> one scalar (or null) for a scalar member
//
// Unknown fields are skipped whatever their depth. Exhausting the stream
// anywhere but after the top-level value is a ParseError.

import { DecodeError, InvalidArgumentError, ParseError, describeError } from "./errors.ts";
import type {
  BindingDescriptor,
  ListType,
  MapType,
  ShapeRegistry,
  ShapeSchema,
  ShapeValue,
  StructureType,
  WireType,
  WireValue,
} from "./schema.ts";
import { isScalarType, payloadMembers, resolveShape, wireTypeToString } from "./schema.ts";
import { decodeScalar } from "./scalar.ts";
import type { Token, TokenStream } from "./tokens.ts";
import { describeToken, isScalarToken } from "./tokens.ts";

export type ParseState = "ExpectStart" | "InObject" | "InArray" | "ExpectScalar";

export interface UnmarshallOptions {
  /**
   * Called for every skipped field, with the member path of the object that
   * contained it.
   */
  onUnknownField?: (path: string, name: string) => void;
}

// ============================================================================
// Parse Context - tracks position for error reporting
// ============================================================================

class ParseContext {
  private path: string[] = [];

  constructor(
    readonly tokens: TokenStream,
    readonly registry: ShapeRegistry,
    readonly options: UnmarshallOptions,
  ) {}

  push(segment: string): void {
    this.path.push(segment);
  }

  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  /** Next token; running out of tokens here means the input was truncated. */
  read(state: ParseState): Token {
    const token = this.tokens.next();
    if (token === undefined) {
      throw this.error(`unexpected end of token stream (state ${state})`);
    }
    return token;
  }

  error(message: string, cause?: unknown): ParseError {
    return new ParseError(message, this.currentPath(), { cause });
  }

  unexpected(token: Token, expected: string, state: ParseState): ParseError {
    return this.error(`expected ${expected}, got ${describeToken(token)} (state ${state})`);
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Parse one structure.
 *
 * @param tokens - Token source, positioned before the structure's startObject
 * @param shape - Shape schema or the name of one in `registry`
 * @param registry - Registry used to resolve nested structure references
 * @returns The structure keyed by member identifier
 */
export function unmarshall(
  tokens: TokenStream,
  shape: ShapeSchema | string,
  registry: ShapeRegistry,
  options: UnmarshallOptions = {},
): ShapeValue {
  if (tokens === null || tokens === undefined) {
    throw new InvalidArgumentError("Invalid argument passed to unmarshall(...): no token stream");
  }
  const ctx = new ParseContext(tokens, registry, options);
  const schema = typeof shape === "string" ? resolveShape(shape, registry) : shape;
  const first = ctx.read("ExpectStart");
  if (first.type !== "startObject") {
    throw ctx.unexpected(first, "start of object", "ExpectStart");
  }
  const value = readStructureBody(ctx, schema);
  expectEnd(ctx);
  return value;
}

/**
 * Parse a top-level array whose elements are of type `member`.
 *
 * Null elements are dropped.
 */
export function unmarshallList(
  tokens: TokenStream,
  member: WireType,
  registry: ShapeRegistry,
  options: UnmarshallOptions = {},
): WireValue[] {
  if (tokens === null || tokens === undefined) {
    throw new InvalidArgumentError("Invalid argument passed to unmarshallList(...): no token stream");
  }
  const ctx = new ParseContext(tokens, registry, options);
  const first = ctx.read("ExpectStart");
  if (first.type !== "startArray") {
    throw ctx.unexpected(first, "start of array", "ExpectStart");
  }
  const value = readListBody(ctx, { kind: "list", member });
  expectEnd(ctx);
  return value;
}

/**
 * Parse a single value of any wire type. Returns `undefined` for JSON null.
 */
export function unmarshallValue(
  tokens: TokenStream,
  type: WireType,
  registry: ShapeRegistry,
  options: UnmarshallOptions = {},
): WireValue | undefined {
  const ctx = new ParseContext(tokens, registry, options);
  const value = readValue(ctx, type, ctx.read("ExpectStart"));
  expectEnd(ctx);
  return value;
}

function expectEnd(ctx: ParseContext): void {
  const trailing = ctx.tokens.next();
  if (trailing !== undefined) {
    throw ctx.error(`unexpected ${describeToken(trailing)} after top-level value`);
  }
}

// ============================================================================
// Typed Dispatch
// ============================================================================

function readValue(ctx: ParseContext, type: WireType, token: Token): WireValue | undefined {
  if (token.type === "null") return undefined;

  switch (type.kind) {
    case "structure":
      if (token.type !== "startObject") throw ctx.unexpected(token, "start of object", "ExpectStart");
      return readStructureBody(ctx, resolveStructure(ctx, type));
    case "list":
      if (token.type !== "startArray") throw ctx.unexpected(token, "start of array", "ExpectStart");
      return readListBody(ctx, type);
    case "map":
      if (token.type !== "startObject") throw ctx.unexpected(token, "start of object", "ExpectStart");
      return readMapBody(ctx, type);
    default:
      break;
  }

  if (!isScalarType(type) || !isScalarToken(token)) {
    throw ctx.unexpected(token, wireTypeToString(type), "ExpectScalar");
  }
  try {
    return decodeScalar(token, type);
  } catch (e) {
    if (e instanceof DecodeError) {
      throw ctx.error(e.message, e);
    }
    throw ctx.error(describeError(e), e);
  }
}

function resolveStructure(ctx: ParseContext, type: StructureType): ShapeSchema {
  try {
    return resolveShape(type, ctx.registry);
  } catch (e) {
    throw ctx.error(describeError(e), e);
  }
}

/** Fields of a structure, after its startObject was consumed. */
function readStructureBody(ctx: ParseContext, shape: ShapeSchema): ShapeValue {
  const byWireName = new Map<string, [string, BindingDescriptor]>();
  for (const [member, binding] of payloadMembers(shape)) {
    byWireName.set(binding.locationName, [member, binding]);
  }

  const target: ShapeValue = {};
  for (;;) {
    const token = ctx.read("InObject");
    if (token.type === "endObject") return target;
    if (token.type !== "fieldName") {
      throw ctx.unexpected(token, "field name or end of object", "InObject");
    }

    const entry = byWireName.get(token.name);
    if (entry === undefined) {
      ctx.options.onUnknownField?.(ctx.currentPath(), token.name);
      skipValue(ctx);
      continue;
    }

    const [member, binding] = entry;
    ctx.push(member);
    const value = readValue(ctx, binding.type, ctx.read("ExpectStart"));
    if (value !== undefined) {
      target[member] = value;
    }
    ctx.pop();
  }
}

/** Elements of a list, after its startArray was consumed. */
function readListBody(ctx: ParseContext, type: ListType): WireValue[] {
  const items: WireValue[] = [];
  for (let index = 0; ; index++) {
    const token = ctx.read("InArray");
    if (token.type === "endArray") return items;
    ctx.push(`[${index}]`);
    const item = readValue(ctx, type.member, token);
    if (item !== undefined) {
      items.push(item);
    }
    ctx.pop();
  }
}

/** Entries of a map, after its startObject was consumed. Keys are always strings. */
function readMapBody(ctx: ParseContext, type: MapType): Map<string, WireValue> {
  const map = new Map<string, WireValue>();
  for (;;) {
    const token = ctx.read("InObject");
    if (token.type === "endObject") return map;
    if (token.type !== "fieldName") {
      throw ctx.unexpected(token, "map key or end of object", "InObject");
    }
    ctx.push(`{${token.name}}`);
    const value = readValue(ctx, type.value, ctx.read("ExpectStart"));
    if (value !== undefined) {
      map.set(token.name, value);
    }
    ctx.pop();
  }
}

/** Consume one whole value (scalar, object or array) without building it. */
function skipValue(ctx: ParseContext): void {
  let depth = 0;
  do {
    const token = ctx.read(depth === 0 ? "ExpectStart" : "InObject");
    switch (token.type) {
      case "startObject":
      case "startArray":
        depth++;
        break;
      case "endObject":
      case "endArray":
        if (depth === 0) throw ctx.unexpected(token, "a value", "ExpectStart");
        depth--;
        break;
      case "fieldName":
        if (depth === 0) throw ctx.unexpected(token, "a value", "ExpectStart");
        break;
      default:
        break;
    }
  } while (depth > 0);
}
