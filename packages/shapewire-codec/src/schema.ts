// Binding descriptors and wire types.
//
// A shape is declared once as an ordered table mapping member identifiers to
// BindingDescriptors. A descriptor says where the member lives on the wire
// and how its value is encoded. The drivers only ever read these tables;
// they never see the concrete types of the values they move.

import { InvalidArgumentError } from "./errors.ts";

// ============================================================================
// Wire Locations
// ============================================================================

/**
 * Where a member lives on a request or response.
 *
 * `greedyPath` fills a `{Name+}` placeholder and keeps `/` unescaped.
 * `statusCode` is only meaningful on responses.
 */
export type WireLocation = "payload" | "query" | "header" | "path" | "greedyPath" | "statusCode";

// ============================================================================
// Wire Types
// ============================================================================

/** Timestamp encodings. Always explicit on a binding, never inferred. */
export type DateFormat = "iso8601" | "unixSeconds" | "unixMillis" | "rfc822";

/** Scalar types that carry no parameters. */
export type PrimitiveKind = "string" | "integer" | "long" | "double" | "float" | "boolean" | "blob";

export interface DateType {
  kind: "date";
  format: DateFormat;
}

/** Scalar wire types, the only ones the Wire Type Registry handles directly. */
export type ScalarType = { kind: PrimitiveKind } | DateType;

export interface ListType {
  kind: "list";
  member: WireType;
  /** Element name for XML and form-encoded envelopes. Defaults to "member". */
  memberName?: string;
  /** Repeat the element under the list's own name instead of wrapping it. */
  flattened?: boolean;
}

/** Map with string keys. */
export interface MapType {
  kind: "map";
  value: WireType;
  keyName?: string;
  valueName?: string;
  flattened?: boolean;
}

/** Nested shape, referenced by name and resolved through a ShapeRegistry. */
export interface StructureType {
  kind: "structure";
  shape: string;
}

export type WireType = ScalarType | ListType | MapType | StructureType;

// ============================================================================
// Bindings and Shapes
// ============================================================================

export interface BindingDescriptor {
  readonly location: WireLocation;
  /** JSON key, query name, header name (or prefix, for maps), or placeholder name. */
  readonly locationName: string;
  readonly type: WireType;
  /** Absence is a marshalling failure instead of being skipped. */
  readonly required?: boolean;
  /** Absence is filled with a freshly generated token. */
  readonly idempotencyToken?: boolean;
  /** The member is the whole request or response body. */
  readonly explicitPayload?: boolean;
}

export interface ShapeSchema {
  readonly name: string;
  /** Members in declaration order. Order is significant for encoding! */
  readonly members: Readonly<Record<string, BindingDescriptor>>;
}

/**
 * Registry of named shapes.
 *
 * Built once with `shapeRegistry()` and passed explicitly to every driver
 * call; never mutated afterwards.
 */
export type ShapeRegistry = ReadonlyMap<string, ShapeSchema>;

// ============================================================================
// Values
// ============================================================================

export type WireScalar = string | number | bigint | boolean | Date | Uint8Array;

/** A parsed structure, keyed by member identifier. Absent members are omitted. */
export interface ShapeValue {
  [member: string]: WireValue;
}

export type WireValue = WireScalar | WireValue[] | Map<string, WireValue> | ShapeValue;

// ============================================================================
// Helpers
// ============================================================================

export function isScalarType(type: WireType): type is ScalarType {
  return type.kind !== "list" && type.kind !== "map" && type.kind !== "structure";
}

/**
 * Resolve a structure reference (or a shape name) to its schema.
 *
 * @throws InvalidArgumentError if the registry has no such shape
 */
export function resolveShape(ref: StructureType | string, registry: ShapeRegistry): ShapeSchema {
  const name = typeof ref === "string" ? ref : ref.shape;
  const resolved = registry.get(name);
  if (!resolved) {
    throw new InvalidArgumentError(`Unknown shape: ${name}`);
  }
  return resolved;
}

/** Members bound to the body, in declaration order. */
export function payloadMembers(shape: ShapeSchema): Array<[string, BindingDescriptor]> {
  return Object.entries(shape.members).filter(([, binding]) => binding.location === "payload");
}

/** The member that stands for the whole body, if the shape has one. */
export function explicitPayloadMember(shape: ShapeSchema): [string, BindingDescriptor] | undefined {
  return Object.entries(shape.members).find(([, binding]) => binding.explicitPayload === true);
}

/** Abbreviated rendering of a wire type for error messages. */
export function wireTypeToString(type: WireType): string {
  switch (type.kind) {
    case "date":
      return `date(${type.format})`;
    case "list":
      return `list<${wireTypeToString(type.member)}>`;
    case "map":
      return `map<string, ${wireTypeToString(type.value)}>`;
    case "structure":
      return `structure ${type.shape}`;
    default:
      return type.kind;
  }
}

/**
 * Build a registry from shapes.
 *
 * Fails if two shapes share a name or if any structure reference (at any
 * depth of list/map nesting) names a shape that is not in the registry.
 */
export function shapeRegistry(...shapes: ShapeSchema[]): ShapeRegistry {
  const registry = new Map<string, ShapeSchema>();
  for (const shape of shapes) {
    if (registry.has(shape.name)) {
      throw new InvalidArgumentError(`Duplicate shape: ${shape.name}`);
    }
    registry.set(shape.name, shape);
  }
  checkRegistry(registry);
  return registry;
}

export function checkRegistry(registry: ShapeRegistry): void {
  const missing: string[] = [];
  for (const shape of registry.values()) {
    for (const [member, binding] of Object.entries(shape.members)) {
      for (const ref of structureRefs(binding.type)) {
        if (!registry.has(ref)) {
          missing.push(`${shape.name}.${member} -> ${ref}`);
        }
      }
    }
  }
  if (missing.length > 0) {
    throw new InvalidArgumentError(`Unresolved shape references: ${missing.join(", ")}`);
  }
}

function structureRefs(type: WireType): string[] {
  switch (type.kind) {
    case "structure":
      return [type.shape];
    case "list":
      return structureRefs(type.member);
    case "map":
      return structureRefs(type.value);
    default:
      return [];
  }
}
