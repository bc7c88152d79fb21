import { afterEach, describe, expect, it } from "vitest";
import { runWithLogContext } from "./log-context";
import { errorMessage, logError, logInfo, logWarn, redactValue, setLogSink } from "./logger";

function captureLines(): Array<{ level: string; payload: Record<string, unknown> }> {
  const lines: Array<{ level: string; payload: Record<string, unknown> }> = [];
  setLogSink((line, level) => {
    lines.push({ level, payload: JSON.parse(line) });
  });
  return lines;
}

describe("logger", () => {
  afterEach(() => {
    setLogSink(() => undefined);
  });

  it("writes one JSON line per call with the request context", () => {
    const lines = captureLines();
    runWithLogContext({ requestId: "req-1", view: "history" }, () => {
      logInfo("Bundle history assembled", { bundleId: "b-1", rows: 3 });
    });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("info");
    expect(lines[0].payload).toMatchObject({
      level: "info",
      message: "Bundle history assembled",
      requestId: "req-1",
      view: "history",
      traceId: null,
      spanId: null,
      bundleId: "b-1",
      rows: 3,
    });
    expect(typeof lines[0].payload.timestamp).toBe("string");
  });

  it("redacts secret-like keys at any depth", () => {
    const lines = captureLines();
    logWarn("Outbound request failed", {
      apiKey: "test-secret",
      request: { headers: { "X-Domino-Api-Key": "test-secret", accept: "application/json" } },
    });

    expect(lines[0].level).toBe("warn");
    expect(lines[0].payload.apiKey).toBe("[REDACTED]");
    expect(lines[0].payload.request).toEqual({
      headers: { "X-Domino-Api-Key": "[REDACTED]", accept: "application/json" },
    });
  });

  it("routes errors to the error level", () => {
    const lines = captureLines();
    logError("Unhandled request error", { message: "boom" });
    expect(lines.map((line) => line.level)).toEqual(["error"]);
  });
});

describe("redactValue", () => {
  it("caps nesting depth", () => {
    expect(redactValue({ a: { b: 1 } }, 5)).toEqual({ a: "[MAX_DEPTH]" });
  });

  it("redacts inside arrays", () => {
    expect(redactValue([{ token: "test-secret", name: "x" }])).toEqual([{ token: "[REDACTED]", name: "x" }]);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
