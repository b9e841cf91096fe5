// Tests for logging middleware

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, isEnabled, loggingMiddleware } from "./logging.ts";
import { Extensions } from "./middleware.ts";
import type { CodecContext, CodecCall, CodecOutcome } from "./middleware.ts";
import { ParseError } from "@shapewire/codec";

describe("loggingMiddleware", () => {
  let consoleLogs: Array<{ message: string; data: unknown }> = [];
  const originalConsoleLog = console.log;

  beforeEach(() => {
    consoleLogs = [];
    // Capture structured logs
    console.log = (message: string, data?: unknown) => {
      consoleLogs.push({ message, data });
    };
    // Enable logging by default for tests
    vi.stubEnv("DEBUG", "shapewire:*");
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    vi.unstubAllEnvs();
  });

  function newCall(payload: unknown = {}): CodecCall {
    return { operation: "CreateRun", direction: "marshall", payload };
  }

  it("logs basic call and result", async () => {
    const middleware = loggingMiddleware();
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    expect(consoleLogs).toHaveLength(1);
    expect(consoleLogs[0].message).toBe("→ marshall CreateRun");
    expect(consoleLogs[0].data).toEqual({
      type: "call",
      operation: "CreateRun",
      direction: "marshall",
    });

    await new Promise((resolve) => setTimeout(resolve, 10));

    const outcome: CodecOutcome = { ok: true, value: "result" };
    middleware.post?.(ctx, call, outcome);
    expect(consoleLogs).toHaveLength(2);
    expect(consoleLogs[1].message).toMatch(/^← marshall CreateRun: ✓ \d+\.\d{2}ms$/);
    expect(consoleLogs[1].data).toMatchObject({ type: "result", ok: true, result: "result" });
  });

  it("logs payloads when enabled", () => {
    const middleware = loggingMiddleware({ logPayload: true });
    const ctx: CodecContext = { extensions: new Extensions() };

    middleware.pre?.(ctx, newCall({ name: "t" }));
    expect(consoleLogs[0].data).toMatchObject({ payload: { name: "t" } });
  });

  it("does not log payloads by default", () => {
    const middleware = loggingMiddleware();
    const ctx: CodecContext = { extensions: new Extensions() };

    middleware.pre?.(ctx, newCall({ name: "t" }));
    expect(consoleLogs[0].data).not.toHaveProperty("payload");
  });

  it("does not log results when disabled", () => {
    const middleware = loggingMiddleware({ logResults: false });
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    middleware.post?.(ctx, call, { ok: true, value: { foo: "bar" } });

    expect(consoleLogs[1].data).toMatchObject({ ok: true });
    expect(consoleLogs[1].data).not.toHaveProperty("result");
  });

  it("logs errors with their code", () => {
    const middleware = loggingMiddleware();
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    middleware.post?.(ctx, call, { ok: false, error: new ParseError("bad", "counters") });

    expect(consoleLogs[1].message).toMatch(/^← marshall CreateRun: ✗/);
    expect(consoleLogs[1].data).toMatchObject({
      ok: false,
      errorCode: "parse",
      error: { name: "ParseError", message: "Parse error at counters: bad" },
    });
  });

  it("logs plain errors without a code", () => {
    const middleware = loggingMiddleware();
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    middleware.post?.(ctx, call, { ok: false, error: new Error("Something went wrong") });

    expect(consoleLogs[1].data).toMatchObject({
      error: { name: "Error", message: "Something went wrong" },
    });
    expect(consoleLogs[1].data).not.toHaveProperty("errorCode");
  });

  it("skips logging fast calls when minDuration is set", () => {
    const middleware = loggingMiddleware({ minDuration: 100 });
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    middleware.post?.(ctx, call, { ok: true, value: "result" });

    expect(consoleLogs).toHaveLength(1);
  });

  it("logs slow calls when minDuration is set", async () => {
    const middleware = loggingMiddleware({ minDuration: 5 });
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    await new Promise((resolve) => setTimeout(resolve, 10));
    middleware.post?.(ctx, call, { ok: true, value: "result" });

    expect(consoleLogs).toHaveLength(2);
  });

  it("does not log when debug is not enabled", () => {
    vi.stubEnv("DEBUG", "");

    const middleware = loggingMiddleware();
    middleware.pre?.({ extensions: new Extensions() }, newCall());
    expect(consoleLogs).toHaveLength(0);
  });

  it("prefers the configured pattern list over the environment", () => {
    const middleware = loggingMiddleware({ debug: "other:*" });
    middleware.pre?.({ extensions: new Extensions() }, newCall());
    expect(consoleLogs).toHaveLength(0);
  });

  it("respects namespace patterns", () => {
    vi.stubEnv("DEBUG", "other:*");

    const middleware = loggingMiddleware({ namespace: "shapewire:calls" });
    const ctx: CodecContext = { extensions: new Extensions() };
    const call = newCall();

    middleware.pre?.(ctx, call);
    expect(consoleLogs).toHaveLength(0);

    vi.stubEnv("DEBUG", "shapewire:calls");
    middleware.pre?.(ctx, call);
    expect(consoleLogs).toHaveLength(1);
  });
});

describe("isEnabled", () => {
  it("supports wildcard patterns", () => {
    expect(isEnabled("anything:here", "*")).toBe(true);
    expect(isEnabled("shapewire:marshall", "shapewire:*")).toBe(true);
    expect(isEnabled("shapewire", "shapewire:*")).toBe(false);
  });

  it("supports exclusion patterns", () => {
    expect(isEnabled("shapewire:unmarshall", "*,-shapewire:unmarshall")).toBe(false);
    expect(isEnabled("shapewire:marshall", "*,-shapewire:unmarshall")).toBe(true);
  });

  it("lets later patterns win", () => {
    expect(isEnabled("shapewire:calls", "-shapewire:calls shapewire:*")).toBe(true);
  });

  it("treats pattern characters literally", () => {
    expect(isEnabled("shapewireXcalls", "shapewire.calls")).toBe(false);
  });
});

describe("createLogger", () => {
  let lines: unknown[][] = [];
  const originalConsoleLog = console.log;

  beforeEach(() => {
    lines = [];
    console.log = (...args: unknown[]) => {
      lines.push(args);
    };
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    vi.unstubAllEnvs();
  });

  it("prefixes messages with the namespace", () => {
    const log = createLogger("shapewire:unmarshall", { debug: "shapewire:*" });
    log.log("skipped unknown field", { name: "extra" });
    log.log("done");
    expect(lines).toEqual([
      ["shapewire:unmarshall skipped unknown field", { name: "extra" }],
      ["shapewire:unmarshall done"],
    ]);
  });

  it("reads DEBUG on every call", () => {
    const log = createLogger("shapewire:marshall");
    vi.stubEnv("DEBUG", "");
    expect(log.enabled()).toBe(false);
    vi.stubEnv("DEBUG", "shapewire:marshall");
    expect(log.enabled()).toBe(true);
  });
});
