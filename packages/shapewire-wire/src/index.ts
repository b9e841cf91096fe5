// shapewire wire
//
// Operation descriptors, the request builder, protocol envelopes and the
// Request Marshalling Driver.

// ============================================================================
// Operations
// ============================================================================

export {
  Protocol,
  HttpMethodSchema,
  OperationDescriptorSchema,
  defineOperation,
  type HttpMethod,
  type OperationDescriptor,
  type OperationDefinition,
} from "./operation.ts";

// ============================================================================
// Requests
// ============================================================================

export {
  RequestBuilder,
  requestUrl,
  escapeUriComponent,
  escapeUriPath,
  type QueryParam,
  type WireRequest,
} from "./request.ts";

// ============================================================================
// Payload Trees and Envelopes
// ============================================================================

export {
  objectNode,
  writeJson,
  type PayloadNode,
  type ScalarNode,
  type ListNode,
  type MapNode,
  type ObjectNode,
} from "./payload.ts";
export { writeXml, type XmlRoot } from "./xml.ts";
export { formParams, writeForm, type FormParam } from "./form.ts";
export { joinHeaderList, splitHeaderList } from "./header.ts";

// ============================================================================
// Marshalling
// ============================================================================

export {
  isStructuredValue,
  isRecord,
  marshallShape,
  structured,
  StructuredShape,
  type PayloadMarshaller,
  type StructuredValue,
} from "./structured.ts";
export {
  RequestMarshaller,
  marshallRequest,
  TARGET_HEADER,
  type MarshallOptions,
} from "./marshaller.ts";
