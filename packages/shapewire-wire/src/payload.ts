// Payload trees.
//
// The marshaller builds a protocol-neutral tree of encoded values; the
// envelope writers (JSON here, XML and form encoding beside it) turn the
// finished tree into a body.

import type { EncodedScalar } from "@shapewire/codec";

export interface ScalarNode {
  readonly kind: "scalar";
  readonly value: EncodedScalar;
}

export interface ListNode {
  readonly kind: "list";
  readonly items: PayloadNode[];
  readonly memberName?: string;
  readonly flattened: boolean;
}

export interface MapNode {
  readonly kind: "map";
  readonly entries: Array<[string, PayloadNode]>;
  readonly keyName?: string;
  readonly valueName?: string;
  readonly flattened: boolean;
}

/** A structure, fields keyed by wire name in declaration order. */
export interface ObjectNode {
  readonly kind: "object";
  readonly fields: Array<[string, PayloadNode]>;
}

export type PayloadNode = ScalarNode | ListNode | MapNode | ObjectNode;

export function objectNode(): ObjectNode {
  return { kind: "object", fields: [] };
}

// ============================================================================
// JSON
// ============================================================================

/** Compact JSON text of a payload tree. */
export function writeJson(node: PayloadNode): string {
  switch (node.kind) {
    case "scalar":
      return node.value.form === "string" ? JSON.stringify(node.value.text) : node.value.text;
    case "list":
      return `[${node.items.map(writeJson).join(",")}]`;
    case "map":
      return writeJsonObject(node.entries);
    case "object":
      return writeJsonObject(node.fields);
  }
}

function writeJsonObject(entries: Array<[string, PayloadNode]>): string {
  const members = entries.map(([name, value]) => `${JSON.stringify(name)}:${writeJson(value)}`);
  return `{${members.join(",")}}`;
}
