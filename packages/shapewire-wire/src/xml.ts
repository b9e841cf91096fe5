// XML envelope for restXml requests.

import * as xml2js from "xml2js";
import type { MapNode, ObjectNode, PayloadNode } from "./payload.ts";

export interface XmlRoot {
  readonly name: string;
  readonly namespace?: string;
}

/** Element content in the object form xml2js builds from. */
type XmlContent = string | XmlElement;

interface XmlElement {
  [name: string]: XmlContent | XmlContent[];
}

const builder = new xml2js.Builder({ headless: true, renderOpts: { pretty: false } });

/**
 * Serialize a structure as an XML document rooted at `root`.
 *
 * Lists wrap each item in a `memberName` element (default `member`) unless
 * flattened, in which case the list's own element repeats. Maps are written
 * as `entry` elements holding key and value.
 */
export function writeXml(node: ObjectNode, root: XmlRoot): string {
  const document: XmlElement = {};
  if (root.namespace !== undefined) {
    document.$ = { xmlns: root.namespace };
  }
  Object.assign(document, elementOf(node));
  // A single top-level key becomes the root element.
  return builder.buildObject({ [root.name]: document });
}

function elementOf(node: ObjectNode): XmlElement {
  const element: XmlElement = {};
  for (const [name, value] of node.fields) {
    element[name] = contentOf(value);
  }
  return element;
}

/** Content of one element; flattened collections repeat the element instead. */
function contentOf(node: PayloadNode): XmlContent | XmlContent[] {
  switch (node.kind) {
    case "scalar":
      return node.value.text;
    case "object":
      return elementOf(node);
    case "list": {
      const items = node.items.flatMap((item) => repeated(contentOf(item)));
      return node.flattened ? items : { [node.memberName ?? "member"]: items };
    }
    case "map": {
      const entries = node.entries.map((entry) => entryOf(node, entry));
      return node.flattened ? entries : { entry: entries };
    }
  }
}

function entryOf(node: MapNode, [key, value]: readonly [string, PayloadNode]): XmlElement {
  return {
    [node.keyName ?? "key"]: key,
    [node.valueName ?? "value"]: contentOf(value),
  };
}

function repeated(content: XmlContent | XmlContent[]): XmlContent[] {
  return Array.isArray(content) ? content : [content];
}
