// Operation descriptors.
//
// One descriptor per API operation, declared once and frozen. The protocol
// only changes how the marshaller assembles the request envelope; per-field
// dispatch is the same for every protocol.

import { z } from "zod";
import { InvalidArgumentError, deepFreeze, formatIssues } from "@shapewire/codec";

/** Request envelope styles */
export const Protocol = {
  /** Path, query, headers and a JSON body */
  REST_JSON: "restJson",
  /** Path, query, headers and an XML body */
  REST_XML: "restXml",
  /** Single JSON body, operation named by the target header */
  AWS_JSON: "awsJson",
  /** Form-encoded body carrying Action and Version */
  QUERY: "query",
} as const;

export type Protocol = (typeof Protocol)[keyof typeof Protocol];

export const HttpMethodSchema = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"]);

export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export const OperationDescriptorSchema = z
  .object({
    name: z.string().min(1),
    protocol: z.enum([Protocol.REST_JSON, Protocol.REST_XML, Protocol.AWS_JSON, Protocol.QUERY]),
    /** Path template with `{Name}` and `{Name+}` placeholders, optionally followed by `?static=query` */
    requestUri: z.string().startsWith("/", { message: "requestUri must start with /" }),
    httpMethod: HttpMethodSchema,
    operationIdentifier: z.string().min(1).optional(),
    apiVersion: z.string().min(1).optional(),
    hasPayloadMembers: z.boolean().default(false),
    /** JSON content type version for awsJson, e.g. "1.0" */
    jsonVersion: z.string().regex(/^\d+\.\d+$/).optional(),
    xmlRoot: z
      .object({
        name: z.string().min(1),
        namespace: z.string().min(1).optional(),
      })
      .optional(),
  })
  .superRefine((op, ctx) => {
    if ((op.protocol === "awsJson" || op.protocol === "query") && op.operationIdentifier === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${op.protocol} operations need an operationIdentifier`,
        path: ["operationIdentifier"],
      });
    }
    if (op.protocol === "query" && op.apiVersion === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "query operations need an apiVersion",
        path: ["apiVersion"],
      });
    }
    if (op.protocol === "restXml" && op.hasPayloadMembers && op.xmlRoot === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "restXml operations with payload members need an xmlRoot",
        path: ["xmlRoot"],
      });
    }
  });

export type OperationDescriptor = Readonly<z.output<typeof OperationDescriptorSchema>>;

/** What callers write; `hasPayloadMembers` may be omitted. */
export type OperationDefinition = z.input<typeof OperationDescriptorSchema>;

/**
 * Validate and freeze an operation descriptor.
 *
 * @throws InvalidArgumentError listing every problem found
 */
export function defineOperation(definition: OperationDefinition): OperationDescriptor {
  const result = OperationDescriptorSchema.safeParse(definition);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid operation ${definition.name}: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return deepFreeze(result.data);
}
