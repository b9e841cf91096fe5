// Tests for the Request Marshalling Driver

import { describe, it, expect } from "vitest";
import {
  InvalidArgumentError,
  MarshallError,
  EncodeError,
  defineShape,
  shapeRegistry,
} from "@shapewire/codec";
import { marshallRequest, RequestMarshaller, TARGET_HEADER } from "./marshaller.ts";
import { defineOperation } from "./operation.ts";
import { structured } from "./structured.ts";
import type { PayloadMarshaller } from "./structured.ts";
import type { WireRequest } from "./request.ts";

// ============================================================================
// Test Shapes
// ============================================================================

const CountersShape = defineShape("Counters", {
  total: { location: "payload", locationName: "total", type: { kind: "integer" } },
  passed: { location: "payload", locationName: "passed", type: { kind: "integer" } },
});

const CreateRunShape = defineShape("CreateRunInput", {
  groupId: { location: "path", locationName: "GroupId", type: { kind: "string" } },
  tags: { location: "query", locationName: "tag", type: { kind: "list", member: { kind: "string" } } },
  maxResults: { location: "query", locationName: "max-results", type: { kind: "integer" } },
  filters: { location: "query", locationName: "filters", type: { kind: "map", value: { kind: "string" } } },
  trace: { location: "header", locationName: "X-Trace-Id", type: { kind: "string" } },
  labels: { location: "header", locationName: "X-Meta-", type: { kind: "map", value: { kind: "string" } } },
  modes: { location: "header", locationName: "X-Modes", type: { kind: "list", member: { kind: "string" } } },
  name: { location: "payload", locationName: "name", type: { kind: "string" } },
  counters: {
    location: "payload",
    locationName: "counters",
    type: { kind: "structure", shape: "Counters" },
  },
  status: { location: "statusCode", locationName: "Status", type: { kind: "integer" } },
});

const registry = shapeRegistry(CountersShape, CreateRunShape);

const CreateRun = defineOperation({
  name: "CreateRun",
  protocol: "restJson",
  requestUri: "/groups/{GroupId}/runs",
  httpMethod: "POST",
  hasPayloadMembers: true,
});

function bodyText(request: WireRequest): string {
  return new TextDecoder().decode(request.body);
}

function marshallError(fn: () => unknown): MarshallError {
  try {
    fn();
  } catch (e) {
    if (e instanceof MarshallError) return e;
    throw e;
  }
  throw new Error("expected a MarshallError");
}

// ============================================================================
// Locations
// ============================================================================

describe("marshallRequest", () => {
  it("writes every location", () => {
    const request = marshallRequest(
      {
        groupId: "g-123",
        tags: ["a", "b", "c"],
        maxResults: 10,
        trace: "t-1",
        name: "t",
        counters: { total: 5, passed: 3 },
      },
      CreateRunShape,
      CreateRun,
      registry,
    );

    expect(request.method).toBe("POST");
    expect(request.path).toBe("/groups/g-123/runs");
    expect(request.query).toEqual([
      ["tag", "a"],
      ["tag", "b"],
      ["tag", "c"],
      ["max-results", "10"],
    ]);
    expect(request.headers).toEqual({
      "X-Trace-Id": "t-1",
      "Content-Type": "application/json",
      "Content-Length": "46",
    });
    expect(bodyText(request)).toBe('{"name":"t","counters":{"total":5,"passed":3}}');
  });

  it("leaves no trace of absent members", () => {
    const request = marshallRequest(
      { groupId: "g-1", name: undefined, trace: null },
      "CreateRunInput",
      CreateRun,
      registry,
    );
    expect(request.query).toEqual([]);
    expect(request.headers).toEqual({ "Content-Type": "application/json", "Content-Length": "2" });
    expect(bodyText(request)).toBe("{}");
  });

  it("substitutes and escapes path parameters", () => {
    const GetGroup = defineOperation({
      name: "GetGroup",
      protocol: "restJson",
      requestUri: "/groups/{GroupId}",
      httpMethod: "GET",
    });
    const shape = defineShape("GetGroupInput", {
      groupId: { location: "path", locationName: "GroupId", type: { kind: "string" } },
    });
    expect(marshallRequest({ groupId: "g-123" }, shape, GetGroup, registry).path).toBe("/groups/g-123");
    expect(marshallRequest({ groupId: "a b/c" }, shape, GetGroup, registry).path).toBe(
      "/groups/a%20b%2Fc",
    );
    expect(marshallRequest({ groupId: "g-1" }, shape, GetGroup, registry).body).toBeUndefined();
  });

  it("expands query maps and header maps and lists", () => {
    const request = marshallRequest(
      {
        groupId: "g",
        filters: { state: "open", owner: "me" },
        labels: new Map([["env", "prod"]]),
        modes: ["fast", null, "safe"],
      },
      CreateRunShape,
      CreateRun,
      registry,
    );
    expect(request.query).toEqual([
      ["state", "open"],
      ["owner", "me"],
    ]);
    expect(request.headers["X-Meta-env"]).toBe("prod");
    expect(request.headers["X-Modes"]).toBe("fast,safe");
  });

  it("joins header lists with the configured separator", () => {
    const request = marshallRequest(
      { groupId: "g", modes: ["fast", "safe"] },
      CreateRunShape,
      CreateRun,
      registry,
      { headerListSeparator: ", " },
    );
    expect(request.headers["X-Modes"]).toBe("fast, safe");
  });

  it("ignores status code members", () => {
    const request = marshallRequest({ groupId: "g", status: 200 }, CreateRunShape, CreateRun, registry);
    expect(bodyText(request)).toBe("{}");
    expect(Object.keys(request.headers)).toEqual(["Content-Type", "Content-Length"]);
  });
});

// ============================================================================
// Structured values
// ============================================================================

describe("structured values", () => {
  it("accepts a value paired with its shape", () => {
    const request = marshallRequest(
      { groupId: "g", counters: structured(CountersShape, { total: 1, passed: 0 }) },
      CreateRunShape,
      CreateRun,
      registry,
    );
    expect(bodyText(request)).toBe('{"counters":{"total":1,"passed":0}}');
  });

  it("lets a value walk its own bindings", () => {
    const counters = {
      marshall(marshaller: PayloadMarshaller): void {
        marshaller.marshall(5, CountersShape.members.total);
      },
    };
    const request = marshallRequest({ groupId: "g", counters }, CreateRunShape, CreateRun, registry);
    expect(bodyText(request)).toBe('{"counters":{"total":5}}');
  });

  it("accepts a structured top-level input", () => {
    const input = structured(CreateRunShape, { groupId: "g-9", name: "n" });
    const request = marshallRequest(input, CreateRunShape, CreateRun, registry);
    expect(request.path).toBe("/groups/g-9/runs");
    expect(bodyText(request)).toBe('{"name":"n"}');
  });

  it("rejects nested members bound outside the payload", () => {
    const counters = {
      marshall(marshaller: PayloadMarshaller): void {
        marshaller.marshall("x", { location: "header", locationName: "X-Nested", type: { kind: "string" } });
      },
    };
    const error = marshallError(() =>
      marshallRequest({ groupId: "g", counters }, CreateRunShape, CreateRun, registry),
    );
    expect(error.field).toBe("counters.X-Nested");
    expect(error.message).toBe(
      'Unable to marshall field "counters.X-Nested": nested members must be bound to the payload, not header',
    );
  });
});

// ============================================================================
// Failures
// ============================================================================

describe("marshalling failures", () => {
  it("fails when the template has no matching placeholder", () => {
    const ListRuns = defineOperation({
      name: "ListRuns",
      protocol: "restJson",
      requestUri: "/runs",
      httpMethod: "GET",
    });
    const error = marshallError(() =>
      marshallRequest({ groupId: "g-123" }, CreateRunShape, ListRuns, registry),
    );
    expect(error.field).toBe("GroupId");
    expect(error.message).toBe(
      'Unable to marshall field "GroupId": request URI /runs has no placeholder {GroupId}',
    );
  });

  it("fails when a placeholder is never filled", () => {
    const error = marshallError(() => marshallRequest({}, CreateRunShape, CreateRun, registry));
    expect(error.field).toBe("GroupId");
    expect(error.cause).toBeInstanceOf(EncodeError);
  });

  it("rejects empty path parameters", () => {
    const error = marshallError(() =>
      marshallRequest({ groupId: "" }, CreateRunShape, CreateRun, registry),
    );
    expect(error.message).toBe('Unable to marshall field "GroupId": path parameter must not be empty');
  });

  it("names the nested field of a type mismatch", () => {
    const error = marshallError(() =>
      marshallRequest(
        { groupId: "g", counters: { total: "five" } },
        CreateRunShape,
        CreateRun,
        registry,
      ),
    );
    expect(error.field).toBe("counters.total");
    expect(error.cause).toBeInstanceOf(EncodeError);
    expect(error.message).toBe('Unable to marshall field "counters.total": expected integer, got string');
  });

  it("names list indexes", () => {
    const error = marshallError(() =>
      marshallRequest({ groupId: "g", tags: ["a", 2] }, CreateRunShape, CreateRun, registry),
    );
    expect(error.field).toBe("tag.[1]");
  });

  it("rejects a scalar where a list belongs", () => {
    const error = marshallError(() =>
      marshallRequest({ groupId: "g", tags: "a" }, CreateRunShape, CreateRun, registry),
    );
    expect(error.message).toBe('Unable to marshall field "tag": expected list<string>, got string');
  });

  it("rejects absent or non-object input", () => {
    expect(() => marshallRequest(undefined, CreateRunShape, CreateRun, registry)).toThrow(
      new InvalidArgumentError("Invalid argument passed to marshall(...)"),
    );
    expect(() => marshallRequest("run", CreateRunShape, CreateRun, registry)).toThrow(
      "Invalid argument passed to marshall(...): expected an object, got string",
    );
  });

  it("wraps unexpected failures", () => {
    const input = {
      marshall(): void {
        throw new Error("boom");
      },
    };
    const error = marshallError(() => marshallRequest(input, CreateRunShape, CreateRun, registry));
    expect(error.field).toBe("<request>");
    expect(error.message).toBe('Unable to marshall field "<request>": boom');
  });
});

// ============================================================================
// Required members and idempotency tokens
// ============================================================================

describe("member flags", () => {
  const PutItemShape = defineShape("PutItemInput", {
    name: { location: "payload", locationName: "Name", type: { kind: "string" }, required: true },
    token: {
      location: "payload",
      locationName: "ClientToken",
      type: { kind: "string" },
      idempotencyToken: true,
    },
  });
  const PutItem = defineOperation({
    name: "PutItem",
    protocol: "restJson",
    requestUri: "/items",
    httpMethod: "PUT",
    hasPayloadMembers: true,
  });

  it("fails on a missing required member", () => {
    const error = marshallError(() => marshallRequest({}, PutItemShape, PutItem, registry));
    expect(error.message).toBe('Unable to marshall field "Name": required member is missing');
  });

  it("fills absent idempotency tokens", () => {
    const request = marshallRequest({ name: "n" }, PutItemShape, PutItem, registry, {
      idempotencyTokenProvider: () => "token-1",
    });
    expect(bodyText(request)).toBe('{"Name":"n","ClientToken":"token-1"}');
  });

  it("keeps caller-supplied tokens", () => {
    const request = marshallRequest({ name: "n", token: "mine" }, PutItemShape, PutItem, registry, {
      idempotencyTokenProvider: () => "token-1",
    });
    expect(bodyText(request)).toBe('{"Name":"n","ClientToken":"mine"}');
  });

  it("generates UUID tokens by default", () => {
    const request = marshallRequest({ name: "n" }, PutItemShape, PutItem, registry);
    expect(bodyText(request)).toMatch(
      /^\{"Name":"n","ClientToken":"[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}"\}$/,
    );
  });
});

// ============================================================================
// Protocol envelopes
// ============================================================================

describe("protocol envelopes", () => {
  it("always sends a JSON object with the target header for awsJson", () => {
    const ListTables = defineOperation({
      name: "ListTables",
      protocol: "awsJson",
      requestUri: "/",
      httpMethod: "POST",
      operationIdentifier: "Tables_2024.ListTables",
      jsonVersion: "1.0",
    });
    const shape = defineShape("ListTablesInput", {
      limit: { location: "payload", locationName: "Limit", type: { kind: "integer" } },
    });

    const empty = marshallRequest({}, shape, ListTables, registry);
    expect(bodyText(empty)).toBe("{}");
    expect(empty.headers).toEqual({
      [TARGET_HEADER]: "Tables_2024.ListTables",
      "Content-Type": "application/x-amz-json-1.0",
      "Content-Length": "2",
    });

    expect(bodyText(marshallRequest({ limit: 5 }, shape, ListTables, registry))).toBe('{"Limit":5}');
  });

  it("form-encodes query protocol requests", () => {
    const ListUsers = defineOperation({
      name: "ListUsers",
      protocol: "query",
      requestUri: "/",
      httpMethod: "POST",
      operationIdentifier: "ListUsers",
      apiVersion: "2010-05-08",
    });
    const shape = defineShape("ListUsersInput", {
      pathPrefix: { location: "payload", locationName: "PathPrefix", type: { kind: "string" } },
      tags: { location: "payload", locationName: "Tags", type: { kind: "list", member: { kind: "string" } } },
      maxItems: { location: "payload", locationName: "MaxItems", type: { kind: "integer" } },
    });

    const request = marshallRequest(
      { pathPrefix: "/a/", tags: ["x"], maxItems: 5 },
      shape,
      ListUsers,
      registry,
    );
    expect(bodyText(request)).toBe(
      "Action=ListUsers&Version=2010-05-08&PathPrefix=%2Fa%2F&Tags.member.1=x&MaxItems=5",
    );
    expect(request.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded; charset=utf-8",
      "Content-Length": "81",
    });
  });

  it("writes the xml root for restXml", () => {
    const PutConfig = defineOperation({
      name: "PutConfig",
      protocol: "restXml",
      requestUri: "/config/{Id}",
      httpMethod: "PUT",
      hasPayloadMembers: true,
      xmlRoot: { name: "PutConfigRequest", namespace: "urn:cfg" },
    });
    const shape = defineShape("PutConfigInput", {
      id: { location: "path", locationName: "Id", type: { kind: "string" } },
      name: { location: "payload", locationName: "Name", type: { kind: "string" } },
      tags: {
        location: "payload",
        locationName: "Tags",
        type: { kind: "list", member: { kind: "string" }, memberName: "Tag" },
      },
    });

    const request = marshallRequest({ id: "c1", name: "a&b", tags: ["x"] }, shape, PutConfig, registry);
    expect(request.path).toBe("/config/c1");
    expect(bodyText(request)).toBe(
      '<PutConfigRequest xmlns="urn:cfg"><Name>a&amp;b</Name><Tags><Tag>x</Tag></Tags></PutConfigRequest>',
    );
    expect(request.headers).toEqual({ "Content-Type": "application/xml", "Content-Length": "98" });
  });
});

// ============================================================================
// Explicit payloads
// ============================================================================

describe("explicit payloads", () => {
  const PutObject = defineOperation({
    name: "PutObject",
    protocol: "restJson",
    requestUri: "/objects/{Key+}",
    httpMethod: "PUT",
  });
  const PutObjectShape = defineShape("PutObjectInput", {
    key: { location: "greedyPath", locationName: "Key", type: { kind: "string" } },
    contentType: { location: "header", locationName: "Content-Type", type: { kind: "string" } },
    body: { location: "payload", locationName: "Body", type: { kind: "blob" }, explicitPayload: true },
  });

  it("sends blobs as raw bytes", () => {
    const bytes = new Uint8Array([104, 105]);
    const request = marshallRequest({ key: "a/b c.txt", body: bytes }, PutObjectShape, PutObject, registry);
    expect(request.path).toBe("/objects/a/b%20c.txt");
    expect(request.body).toBe(bytes);
    expect(request.headers).toEqual({
      "Content-Type": "application/octet-stream",
      "Content-Length": "2",
    });
  });

  it("keeps a content type bound by the caller", () => {
    const request = marshallRequest(
      { key: "k", contentType: "text/plain", body: new Uint8Array([1]) },
      PutObjectShape,
      PutObject,
      registry,
    );
    expect(request.headers["Content-Type"]).toBe("text/plain");
  });

  it("sends a structure as the whole document", () => {
    const shape = defineShape("PutCountersInput", {
      id: { location: "path", locationName: "Key", type: { kind: "string" } },
      counters: {
        location: "payload",
        locationName: "Counters",
        type: { kind: "structure", shape: "Counters" },
        explicitPayload: true,
      },
    });
    const request = marshallRequest(
      { id: "k", counters: { total: 1, passed: 2 } },
      shape,
      defineOperation({ name: "PutCounters", protocol: "restJson", requestUri: "/c/{Key}", httpMethod: "PUT" }),
      registry,
    );
    expect(bodyText(request)).toBe('{"total":1,"passed":2}');
  });

  const UploadShape = defineShape("UploadInput", {
    body: { location: "payload", locationName: "Body", type: { kind: "blob" }, explicitPayload: true },
  });

  it("keeps the target header for awsJson raw payloads", () => {
    const Upload = defineOperation({
      name: "Upload",
      protocol: "awsJson",
      requestUri: "/",
      httpMethod: "POST",
      operationIdentifier: "Store.Upload",
    });
    const request = marshallRequest({ body: new Uint8Array([7]) }, UploadShape, Upload, registry);
    expect(request.headers).toEqual({
      [TARGET_HEADER]: "Store.Upload",
      "Content-Type": "application/octet-stream",
      "Content-Length": "1",
    });
  });

  it("refuses raw payloads for query operations", () => {
    const Upload = defineOperation({
      name: "Upload",
      protocol: "query",
      requestUri: "/",
      httpMethod: "POST",
      operationIdentifier: "Upload",
      apiVersion: "2020-01-01",
    });
    const error = marshallError(() =>
      marshallRequest({ body: new Uint8Array([7]) }, UploadShape, Upload, registry),
    );
    expect(error.message).toBe(
      'Unable to marshall field "Body": query operations send form parameters, not a raw payload',
    );
  });
});

// ============================================================================
// Lower-level driver
// ============================================================================

describe("RequestMarshaller", () => {
  it("must be started before use", () => {
    const marshaller = new RequestMarshaller(CreateRun, registry);
    expect(() => marshaller.marshall("g", CreateRunShape.members.groupId)).toThrow(
      "startMarshalling() must be called before marshalling members",
    );
  });

  it("produces independent requests per call", () => {
    const marshaller = new RequestMarshaller(CreateRun, registry);

    marshaller.startMarshalling();
    marshaller.marshall("g-1", CreateRunShape.members.groupId);
    marshaller.marshall("first", CreateRunShape.members.name);
    const first = marshaller.finishMarshalling();

    marshaller.startMarshalling();
    marshaller.marshall("g-2", CreateRunShape.members.groupId);
    const second = marshaller.finishMarshalling();

    expect(first.path).toBe("/groups/g-1/runs");
    expect(bodyText(first)).toBe('{"name":"first"}');
    expect(second.path).toBe("/groups/g-2/runs");
    expect(bodyText(second)).toBe("{}");
  });
});
