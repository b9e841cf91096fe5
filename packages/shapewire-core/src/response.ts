// Response unmarshalling.
//
// Fills an output shape from every part of a response: header-bound members,
// the status code, and the body (either the explicit payload member or the
// payload members, parsed from a token stream).

import { z } from "zod";
import {
  InvalidArgumentError,
  JsonTokenizer,
  ParseError,
  decodeScalar,
  describeError,
  explicitPayloadMember,
  formatIssues,
  isScalarType,
  payloadMembers,
  resolveShape,
  unmarshall,
  wireTypeToString,
} from "@shapewire/codec";
import { splitHeaderList } from "@shapewire/wire";
import type {
  BindingDescriptor,
  ScalarType,
  ShapeRegistry,
  ShapeSchema,
  ShapeValue,
  TokenStream,
  WireValue,
} from "@shapewire/codec";

export const WireResponseSchema = z.object({
  statusCode: z.number().int().min(100).max(599),
  headers: z.record(z.string(), z.string()).default({}),
  body: z.union([z.instanceof(Uint8Array), z.string()]).optional(),
});

export type WireResponse = z.input<typeof WireResponseSchema>;

export interface UnmarshallResponseOptions {
  /** Separator between list items in header values. Defaults to ",". */
  headerListSeparator?: string;
  /** Token source over a non-empty body. Defaults to the JSON tokenizer. */
  tokenizer?: (body: Uint8Array) => TokenStream;
  /** Called for every body field the output shape does not bind. */
  onUnknownField?: (path: string, name: string) => void;
}

/**
 * Parse a response into the output shape.
 *
 * @param response - A WireResponse; validated before any work is done
 * @param shape - Output shape or its name in `registry`
 * @throws InvalidArgumentError if `response` is not a valid WireResponse
 * @throws ParseError on a malformed body or an undecodable header
 */
export function unmarshallResponse(
  response: unknown,
  shape: ShapeSchema | string,
  registry: ShapeRegistry,
  options: UnmarshallResponseOptions = {},
): ShapeValue {
  const parsed = WireResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Invalid argument passed to unmarshall(...): ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  const { statusCode, headers, body } = parsed.data;
  const schema = typeof shape === "string" ? resolveShape(shape, registry) : shape;
  const separator = options.headerListSeparator ?? ",";
  const tokenizer = options.tokenizer ?? ((bytes: Uint8Array) => new JsonTokenizer(bytes));
  const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body;
  const unmarshallOptions = { onUnknownField: options.onUnknownField };

  const result: ShapeValue = {};

  const explicit = explicitPayloadMember(schema);
  if (explicit !== undefined) {
    const [member, binding] = explicit;
    const value = readExplicitPayload(bytes, binding, registry, tokenizer, unmarshallOptions);
    if (value !== undefined) result[member] = value;
  } else if (bytes !== undefined && bytes.byteLength > 0 && payloadMembers(schema).length > 0) {
    Object.assign(result, unmarshall(tokenizer(bytes), schema, registry, unmarshallOptions));
  }

  for (const [member, binding] of Object.entries(schema.members)) {
    if (binding.location === "statusCode") {
      result[member] = statusCode;
    } else if (binding.location === "header") {
      const value = readHeader(headers, binding, member, separator);
      if (value !== undefined) result[member] = value;
    }
  }

  return result;
}

function readExplicitPayload(
  bytes: Uint8Array | undefined,
  binding: BindingDescriptor,
  registry: ShapeRegistry,
  tokenizer: (body: Uint8Array) => TokenStream,
  options: { onUnknownField?: (path: string, name: string) => void },
): WireValue | undefined {
  if (bytes === undefined) return undefined;
  const type = binding.type;
  switch (type.kind) {
    case "blob":
      return bytes;
    case "string":
      return new TextDecoder().decode(bytes);
    case "structure":
      if (bytes.byteLength === 0) return undefined;
      return unmarshall(tokenizer(bytes), resolveShape(type, registry), registry, options);
    default:
      throw new InvalidArgumentError(`${wireTypeToString(type)} cannot be an explicit payload`);
  }
}

// ============================================================================
// Headers
// ============================================================================

function readHeader(
  headers: Readonly<Record<string, string>>,
  binding: BindingDescriptor,
  member: string,
  separator: string,
): WireValue | undefined {
  const type = binding.type;
  const name = binding.locationName.toLowerCase();

  if (type.kind === "map") {
    // Prefix headers: every header starting with the name, keyed by the rest.
    const map = new Map<string, WireValue>();
    for (const [header, text] of Object.entries(headers)) {
      if (header.length === name.length || !header.toLowerCase().startsWith(name)) continue;
      const key = header.slice(name.length);
      map.set(key, decodeHeader(text, scalarOf(type.value, member), `${member}.{${key}}`));
    }
    return map.size > 0 ? map : undefined;
  }

  const text = findHeader(headers, name);
  if (text === undefined) return undefined;

  if (type.kind === "list") {
    const itemType = scalarOf(type.member, member);
    return splitHeaderList(text, separator).map((item, index) =>
      decodeHeader(item, itemType, `${member}.[${index}]`),
    );
  }

  return decodeHeader(text, scalarOf(type, member), member);
}

function findHeader(headers: Readonly<Record<string, string>>, lowerName: string): string | undefined {
  for (const [header, text] of Object.entries(headers)) {
    if (header.toLowerCase() === lowerName) return text;
  }
  return undefined;
}

function scalarOf(type: BindingDescriptor["type"], member: string): ScalarType {
  if (!isScalarType(type)) {
    throw new ParseError(`${wireTypeToString(type)} cannot be read from a header`, member);
  }
  return type;
}

function decodeHeader(text: string, type: ScalarType, path: string): WireValue {
  try {
    return decodeScalar(text, type);
  } catch (e) {
    throw new ParseError(describeError(e), path, { cause: e });
  }
}
