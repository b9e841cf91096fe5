// Structured-Value capability.
//
// A nested value marshals itself: the driver hands it a PayloadMarshaller
// and the value walks its own bindings. The driver never needs to know the
// concrete type of a nested shape.

import type { BindingDescriptor, ShapeSchema } from "@shapewire/codec";

/** Sink for one shape's members. */
export interface PayloadMarshaller {
  /**
   * Write one member. Absent values (`undefined` or `null`) leave no trace
   * unless the binding is required or an idempotency token.
   */
  marshall(value: unknown, binding: BindingDescriptor): void;
}

export interface StructuredValue {
  marshall(marshaller: PayloadMarshaller): void;
}

export function isStructuredValue(value: unknown): value is StructuredValue {
  return (
    typeof value === "object" &&
    value !== null &&
    "marshall" in value &&
    typeof value.marshall === "function"
  );
}

/** A plain object of member values keyed by member identifier. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

/** Walk a shape's bindings in declaration order, taking values from `data`. */
export function marshallShape(
  data: Readonly<Record<string, unknown>>,
  shape: ShapeSchema,
  marshaller: PayloadMarshaller,
): void {
  for (const [member, binding] of Object.entries(shape.members)) {
    marshaller.marshall(data[member], binding);
  }
}

/** Plain data paired with the shape that describes it. */
export class StructuredShape implements StructuredValue {
  constructor(
    readonly shape: ShapeSchema,
    readonly data: Readonly<Record<string, unknown>>,
  ) {}

  marshall(marshaller: PayloadMarshaller): void {
    marshallShape(this.data, this.shape, marshaller);
  }
}

export function structured(shape: ShapeSchema, data: Readonly<Record<string, unknown>>): StructuredValue {
  return new StructuredShape(shape, data);
}
