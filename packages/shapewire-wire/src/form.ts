// Form encoding for query-protocol requests.
//
// Nested names are dotted paths with 1-based indexes:
//   Tags.member.1=a
//   Attributes.entry.1.key=color  Attributes.entry.1.value=red
// Flattened lists and maps drop the `member` / `entry` segment.

import type { ObjectNode, PayloadNode } from "./payload.ts";
import { escapeUriComponent } from "./request.ts";

export type FormParam = readonly [name: string, value: string];

/** Flatten a structure into form parameters, in field order. */
export function formParams(node: ObjectNode): FormParam[] {
  const params: FormParam[] = [];
  for (const [name, value] of node.fields) {
    flatten(name, value, params);
  }
  return params;
}

function flatten(prefix: string, node: PayloadNode, out: FormParam[]): void {
  switch (node.kind) {
    case "scalar":
      out.push([prefix, node.value.text]);
      return;
    case "object":
      for (const [name, value] of node.fields) {
        flatten(`${prefix}.${name}`, value, out);
      }
      return;
    case "list":
      if (node.items.length === 0) {
        // Empty lists are sent as `Name=`.
        out.push([prefix, ""]);
        return;
      }
      node.items.forEach((item, i) => {
        const base = node.flattened ? prefix : `${prefix}.${node.memberName ?? "member"}`;
        flatten(`${base}.${i + 1}`, item, out);
      });
      return;
    case "map":
      node.entries.forEach(([key, value], i) => {
        const base = node.flattened ? `${prefix}.${i + 1}` : `${prefix}.entry.${i + 1}`;
        out.push([`${base}.${node.keyName ?? "key"}`, key]);
        flatten(`${base}.${node.valueName ?? "value"}`, value, out);
      });
      return;
  }
}

/** `application/x-www-form-urlencoded` text of the parameters. */
export function writeForm(params: readonly FormParam[]): string {
  return params
    .map(([name, value]) => `${escapeUriComponent(name)}=${escapeUriComponent(value)}`)
    .join("&");
}
