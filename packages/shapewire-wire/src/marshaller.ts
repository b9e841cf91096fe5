// Request Marshalling Driver.
//
// Walks (value, binding) pairs in declaration order and writes each value to
// its request part: path placeholder, query entry, header or payload tree.
// Absent values are skipped entirely. Once every member is written, the
// payload tree is serialized according to the operation's protocol.
//
// Every failure while writing a field is rethrown as a MarshallError naming
// the field's wire name. Nested failures extend the path (`counters.total`).

import { randomUUID } from "node:crypto";
import {
  EncodeError,
  InvalidArgumentError,
  MarshallError,
  describeValue,
  encodeScalar,
  isScalarType,
  isShapewireError,
  resolveShape,
  wireTypeToString,
} from "@shapewire/codec";
import type {
  BindingDescriptor,
  ListType,
  MapType,
  ShapeRegistry,
  ShapeSchema,
  StructureType,
  WireType,
} from "@shapewire/codec";
import type { OperationDescriptor } from "./operation.ts";
import type { ListNode, MapNode, ObjectNode, PayloadNode } from "./payload.ts";
import { objectNode, writeJson } from "./payload.ts";
import { writeXml } from "./xml.ts";
import { joinHeaderList } from "./header.ts";
import { formParams, writeForm } from "./form.ts";
import type { FormParam } from "./form.ts";
import { RequestBuilder } from "./request.ts";
import type { WireRequest } from "./request.ts";
import type { PayloadMarshaller } from "./structured.ts";
import { isRecord, isStructuredValue, marshallShape } from "./structured.ts";

/** Header naming the operation of a single-endpoint JSON request. */
export const TARGET_HEADER = "X-Amz-Target";

export interface MarshallOptions {
  /** Source of idempotency tokens for absent token members. Defaults to a random UUID. */
  idempotencyTokenProvider?: () => string;
  /** Separator between list items in a header value. Defaults to ",". */
  headerListSeparator?: string;
}

type ExplicitBody =
  | { kind: "bytes"; bytes: Uint8Array; contentType: string }
  | { kind: "document"; node: ObjectNode; rootName: string };

// ============================================================================
// Payload trees
// ============================================================================

/** Builds payload nodes; shared by the top-level and every nested marshaller. */
class PayloadWriter {
  constructor(
    readonly registry: ShapeRegistry,
    readonly tokenProvider: () => string,
  ) {}

  /**
   * The value to write for a binding, or `undefined` to skip it.
   *
   * @throws EncodeError if a required member is absent
   */
  present(value: unknown, binding: BindingDescriptor): unknown {
    if (value !== undefined && value !== null) return value;
    if (binding.idempotencyToken === true) return this.tokenProvider();
    if (binding.required === true) throw new EncodeError("required member is missing");
    return undefined;
  }

  node(value: unknown, type: WireType): PayloadNode {
    switch (type.kind) {
      case "list":
        return this.listNode(value, type);
      case "map":
        return this.mapNode(value, type);
      case "structure":
        return this.structureNode(value, type);
      default:
        return { kind: "scalar", value: encodeScalar(value, type) };
    }
  }

  listNode(value: unknown, type: ListType): ListNode {
    if (!Array.isArray(value)) throw mismatch(value, type);
    const items: PayloadNode[] = [];
    value.forEach((item: unknown, index) => {
      if (item === undefined || item === null) return;
      try {
        items.push(this.node(item, type.member));
      } catch (e) {
        throw MarshallError.wrap(`[${index}]`, e);
      }
    });
    return { kind: "list", items, memberName: type.memberName, flattened: type.flattened ?? false };
  }

  mapNode(value: unknown, type: MapType): MapNode {
    const entries: Array<[string, PayloadNode]> = [];
    for (const [key, item] of mapEntries(value, type)) {
      if (item === undefined || item === null) continue;
      try {
        entries.push([key, this.node(item, type.value)]);
      } catch (e) {
        throw MarshallError.wrap(`{${key}}`, e);
      }
    }
    return {
      kind: "map",
      entries,
      keyName: type.keyName,
      valueName: type.valueName,
      flattened: type.flattened ?? false,
    };
  }

  structureNode(value: unknown, type: StructureType): ObjectNode {
    const nested = new NestedMarshaller(this);
    if (isStructuredValue(value)) {
      value.marshall(nested);
    } else if (isRecord(value)) {
      marshallShape(value, resolveShape(type, this.registry), nested);
    } else {
      throw mismatch(value, type);
    }
    return nested.node;
  }
}

/** Marshaller handed to nested structures; every member goes to the payload. */
class NestedMarshaller implements PayloadMarshaller {
  readonly node = objectNode();

  constructor(private readonly writer: PayloadWriter) {}

  marshall(value: unknown, binding: BindingDescriptor): void {
    try {
      const present = this.writer.present(value, binding);
      if (present === undefined) return;
      if (binding.location !== "payload") {
        throw new EncodeError(`nested members must be bound to the payload, not ${binding.location}`);
      }
      this.node.fields.push([binding.locationName, this.writer.node(present, binding.type)]);
    } catch (e) {
      throw MarshallError.wrap(binding.locationName, e);
    }
  }
}

// ============================================================================
// Request marshaller
// ============================================================================

/**
 * Lower-level driver: `startMarshalling`, one `marshall` per member, then
 * `finishMarshalling`. A marshaller serves one call at a time.
 */
export class RequestMarshaller implements PayloadMarshaller {
  private readonly writer: PayloadWriter;
  private readonly headerListSeparator: string;
  private builder: RequestBuilder | null = null;
  private root: ObjectNode = objectNode();
  private explicit: ExplicitBody | undefined;

  constructor(
    readonly operation: OperationDescriptor,
    readonly registry: ShapeRegistry,
    options: MarshallOptions = {},
  ) {
    this.writer = new PayloadWriter(registry, options.idempotencyTokenProvider ?? randomUUID);
    this.headerListSeparator = options.headerListSeparator ?? ",";
  }

  startMarshalling(): void {
    const op = this.operation;
    this.builder = new RequestBuilder(op.name, op.httpMethod, op.requestUri);
    this.root = objectNode();
    this.explicit = undefined;
  }

  marshall(value: unknown, binding: BindingDescriptor): void {
    const builder = this.current();
    try {
      const present = this.writer.present(value, binding);
      if (present === undefined) return;
      this.dispatch(present, binding, builder);
    } catch (e) {
      throw MarshallError.wrap(binding.locationName, e);
    }
  }

  /**
   * Serialize the body and freeze the request.
   *
   * @throws MarshallError if a path placeholder was never filled
   */
  finishMarshalling(): WireRequest {
    const builder = this.current();
    const unresolved = builder.unresolvedPlaceholders();
    if (unresolved.length > 0) {
      throw new MarshallError(
        unresolved[0],
        new EncodeError(`no value for placeholder in ${this.operation.requestUri}`),
      );
    }
    const body = this.writeBody(builder);
    this.builder = null;
    return builder.build(body);
  }

  private current(): RequestBuilder {
    if (this.builder === null) {
      throw new InvalidArgumentError("startMarshalling() must be called before marshalling members");
    }
    return this.builder;
  }

  private dispatch(value: unknown, binding: BindingDescriptor, builder: RequestBuilder): void {
    switch (binding.location) {
      case "path":
      case "greedyPath":
        this.writePath(value, binding, builder);
        return;
      case "query":
        this.writeQuery(value, binding, builder);
        return;
      case "header":
        this.writeHeader(value, binding, builder);
        return;
      case "payload":
        if (binding.explicitPayload === true) {
          this.writeExplicit(value, binding);
        } else {
          this.root.fields.push([binding.locationName, this.writer.node(value, binding.type)]);
        }
        return;
      case "statusCode":
        // Response only.
        return;
    }
  }

  private writePath(value: unknown, binding: BindingDescriptor, builder: RequestBuilder): void {
    const greedy = binding.location === "greedyPath";
    const text = scalarText(value, binding.type);
    if (text === "") {
      throw new EncodeError("path parameter must not be empty");
    }
    if (!builder.substitutePath(binding.locationName, text, greedy)) {
      const placeholder = greedy ? `{${binding.locationName}+}` : `{${binding.locationName}}`;
      throw new EncodeError(`request URI ${this.operation.requestUri} has no placeholder ${placeholder}`);
    }
  }

  private writeQuery(value: unknown, binding: BindingDescriptor, builder: RequestBuilder): void {
    const type = binding.type;
    if (type.kind === "map") {
      // One parameter per key; list values repeat the key.
      for (const [key, item] of mapEntries(value, type)) {
        if (item === undefined || item === null) continue;
        for (const text of textItems(item, type.value)) {
          builder.addQuery(key, text);
        }
      }
      return;
    }
    for (const text of textItems(value, type)) {
      builder.addQuery(binding.locationName, text);
    }
  }

  private writeHeader(value: unknown, binding: BindingDescriptor, builder: RequestBuilder): void {
    const type = binding.type;
    if (type.kind === "map") {
      for (const [key, item] of mapEntries(value, type)) {
        if (item === undefined || item === null) continue;
        builder.setHeader(`${binding.locationName}${key}`, scalarText(item, type.value));
      }
      return;
    }
    const items = textItems(value, type);
    if (type.kind === "list" && items.length === 0) return;
    builder.setHeader(binding.locationName, joinHeaderList(items, this.headerListSeparator));
  }

  private writeExplicit(value: unknown, binding: BindingDescriptor): void {
    const type = binding.type;
    if (this.operation.protocol === "query" && type.kind !== "structure") {
      throw new EncodeError("query operations send form parameters, not a raw payload");
    }
    switch (type.kind) {
      case "blob":
        if (!(value instanceof Uint8Array)) throw mismatch(value, type);
        this.explicit = { kind: "bytes", bytes: value, contentType: "application/octet-stream" };
        return;
      case "string":
        if (typeof value !== "string") throw mismatch(value, type);
        this.explicit = {
          kind: "bytes",
          bytes: new TextEncoder().encode(value),
          contentType: "text/plain; charset=utf-8",
        };
        return;
      case "structure":
        this.explicit = {
          kind: "document",
          node: this.writer.structureNode(value, type),
          rootName: binding.locationName,
        };
        return;
      default:
        throw new EncodeError(`${wireTypeToString(type)} cannot be an explicit payload`);
    }
  }

  // ==========================================================================
  // Envelopes
  // ==========================================================================

  private writeBody(builder: RequestBuilder): Uint8Array | undefined {
    const op = this.operation;
    const explicit = this.explicit;
    if (op.protocol === "awsJson") {
      builder.setHeader(TARGET_HEADER, op.operationIdentifier ?? op.name);
    }
    if (explicit?.kind === "bytes") {
      return withContent(builder, explicit.contentType, explicit.bytes);
    }
    const root = explicit?.kind === "document" ? explicit.node : this.root;
    const hasPayload = explicit !== undefined || op.hasPayloadMembers || root.fields.length > 0;

    switch (op.protocol) {
      case "restJson":
        if (!hasPayload) return undefined;
        return withContent(builder, "application/json", utf8(writeJson(root)));
      case "awsJson":
        return withContent(
          builder,
          `application/x-amz-json-${op.jsonVersion ?? "1.1"}`,
          utf8(writeJson(root)),
        );
      case "restXml": {
        if (!hasPayload) return undefined;
        const xmlRoot =
          explicit?.kind === "document"
            ? { name: explicit.rootName, namespace: op.xmlRoot?.namespace }
            : op.xmlRoot ?? { name: `${op.name}Request` };
        return withContent(builder, "application/xml", utf8(writeXml(root, xmlRoot)));
      }
      case "query": {
        const params: FormParam[] = [
          ["Action", op.operationIdentifier ?? op.name],
          ["Version", op.apiVersion ?? ""],
          ...formParams(root),
        ];
        return withContent(
          builder,
          "application/x-www-form-urlencoded; charset=utf-8",
          utf8(writeForm(params)),
        );
      }
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Marshall a typed input into a wire-ready request.
 *
 * @param input - Member values keyed by member identifier, or a StructuredValue
 * @param shape - Input shape or its name in `registry`
 * @throws InvalidArgumentError if `input` is absent or not an object
 * @throws MarshallError if any member cannot be written
 */
export function marshallRequest(
  input: unknown,
  shape: ShapeSchema | string,
  operation: OperationDescriptor,
  registry: ShapeRegistry,
  options: MarshallOptions = {},
): WireRequest {
  if (input === undefined || input === null) {
    throw new InvalidArgumentError("Invalid argument passed to marshall(...)");
  }
  const schema = typeof shape === "string" ? resolveShape(shape, registry) : shape;
  const marshaller = new RequestMarshaller(operation, registry, options);
  try {
    marshaller.startMarshalling();
    if (isStructuredValue(input)) {
      input.marshall(marshaller);
    } else if (isRecord(input)) {
      marshallShape(input, schema, marshaller);
    } else {
      throw new InvalidArgumentError(
        `Invalid argument passed to marshall(...): expected an object, got ${describeValue(input)}`,
      );
    }
    return marshaller.finishMarshalling();
  } catch (e) {
    if (isShapewireError(e)) throw e;
    throw new MarshallError("<request>", e);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function scalarText(value: unknown, type: WireType): string {
  if (!isScalarType(type)) {
    throw new EncodeError(`${wireTypeToString(type)} cannot be written as text`);
  }
  return encodeScalar(value, type).text;
}

/** Text of a scalar, or of each present item of a list of scalars. */
function textItems(value: unknown, type: WireType): string[] {
  if (type.kind !== "list") return [scalarText(value, type)];
  if (!Array.isArray(value)) throw mismatch(value, type);
  const texts: string[] = [];
  value.forEach((item: unknown, index) => {
    if (item === undefined || item === null) return;
    try {
      texts.push(scalarText(item, type.member));
    } catch (e) {
      throw MarshallError.wrap(`[${index}]`, e);
    }
  });
  return texts;
}

/** Entries of a Map with string keys or of a plain object. */
function mapEntries(value: unknown, type: MapType): Array<[string, unknown]> {
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, item] of value) {
      if (typeof key !== "string") {
        throw new EncodeError(`map keys must be strings, got ${describeValue(key)}`);
      }
      entries.push([key, item]);
    }
    return entries;
  }
  if (isRecord(value)) return Object.entries(value);
  throw mismatch(value, type);
}

function mismatch(value: unknown, type: WireType): EncodeError {
  return new EncodeError(`expected ${wireTypeToString(type)}, got ${describeValue(value)}`);
}

function withContent(builder: RequestBuilder, contentType: string, body: Uint8Array): Uint8Array {
  if (!builder.hasHeader("Content-Type")) {
    builder.setHeader("Content-Type", contentType);
  }
  builder.setHeader("Content-Length", String(body.byteLength));
  return body;
}

function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
