// Validated construction of binding tables.
//
// Generated shape tables go through `defineShape` once at load time. The
// result is deep-frozen so it can be shared by every marshall/unmarshall call.

import { z } from "zod";
import { InvalidArgumentError } from "./errors.ts";
import type { BindingDescriptor, ShapeSchema, WireType } from "./schema.ts";
import { isScalarType } from "./schema.ts";

const DateFormatSchema = z.enum(["iso8601", "unixSeconds", "unixMillis", "rfc822"]);

export const WireTypeSchema: z.ZodType<WireType> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.enum(["string", "integer", "long", "double", "float", "boolean", "blob"]),
    }),
    z.object({ kind: z.literal("date"), format: DateFormatSchema }),
    z.object({
      kind: z.literal("list"),
      member: WireTypeSchema,
      memberName: z.string().min(1).optional(),
      flattened: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal("map"),
      value: WireTypeSchema,
      keyName: z.string().min(1).optional(),
      valueName: z.string().min(1).optional(),
      flattened: z.boolean().optional(),
    }),
    z.object({ kind: z.literal("structure"), shape: z.string().min(1) }),
  ]),
);

export const BindingDescriptorSchema = z
  .object({
    location: z.enum(["payload", "query", "header", "path", "greedyPath", "statusCode"]),
    locationName: z.string().min(1),
    type: WireTypeSchema,
    required: z.boolean().optional(),
    idempotencyToken: z.boolean().optional(),
    explicitPayload: z.boolean().optional(),
  })
  .superRefine((binding, ctx) => {
    const problem = bindingProblem(binding);
    if (problem !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem, path: ["type"] });
    }
  });

const ShapeSchemaSchema = z
  .object({
    name: z.string().min(1),
    members: z.record(z.string(), BindingDescriptorSchema),
  })
  .superRefine((shape, ctx) => {
    const explicit = Object.values(shape.members).filter((b) => b.explicitPayload === true);
    if (explicit.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "a shape has at most one explicit payload member",
        path: ["members"],
      });
    }

    // Wire names are unique per location; header names ignore case.
    const seen = new Map<string, string>();
    for (const [member, binding] of Object.entries(shape.members)) {
      const group = nameGroup(binding);
      if (group === null) continue;
      const wireName = group === "header" ? binding.locationName.toLowerCase() : binding.locationName;
      const other = seen.get(`${group}:${wireName}`);
      if (other === undefined) {
        seen.set(`${group}:${wireName}`, member);
        continue;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${other} and ${member} share the ${group} name "${binding.locationName}"`,
        path: ["members", member],
      });
    }
  });

function nameGroup(binding: BindingDescriptor): string | null {
  switch (binding.location) {
    case "payload":
      return binding.explicitPayload === true ? null : "payload";
    case "path":
    case "greedyPath":
      return "path";
    case "header":
    case "query":
      return binding.location;
    case "statusCode":
      return null;
  }
}

/** Which combinations of location and wire type the drivers can move. */
function bindingProblem(binding: BindingDescriptor): string | null {
  const { type } = binding;
  if (binding.explicitPayload === true) {
    if (binding.location !== "payload") return "an explicit payload member must be bound to the payload";
    if (type.kind !== "structure" && type.kind !== "blob" && type.kind !== "string") {
      return "an explicit payload member must be a structure, blob or string";
    }
  }
  switch (binding.location) {
    case "path":
    case "greedyPath":
      return isScalarType(type) ? null : `${binding.location} members must be scalars`;
    case "statusCode":
      return type.kind === "integer" ? null : "statusCode members must be integers";
    case "header":
      if (isScalarType(type)) return null;
      if (type.kind === "list" && isScalarType(type.member)) return null;
      if (type.kind === "map" && isScalarType(type.value)) return null;
      return "header members must be scalars, lists of scalars or maps of scalars";
    case "query":
      if (isScalarType(type)) return null;
      if (type.kind === "list" && isScalarType(type.member)) return null;
      if (type.kind === "map") {
        const value = type.value;
        if (isScalarType(value)) return null;
        if (value.kind === "list" && isScalarType(value.member)) return null;
      }
      return "query members must be scalars, lists of scalars or maps of those";
    case "payload":
      return null;
  }
}

/**
 * Validate and freeze a shape's binding table.
 *
 * @throws InvalidArgumentError describing every invalid binding
 */
export function defineShape(
  name: string,
  members: Record<string, BindingDescriptor>,
): ShapeSchema {
  const result = ShapeSchemaSchema.safeParse({ name, members });
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid shape ${name}: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return deepFreeze(result.data);
}

/** Render zod issues as `path: message` pairs. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
