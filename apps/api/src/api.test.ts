import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { GOVERNANCE_EVENT_CATALOG } from "@gov-explorer/shared";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import type { GovernanceDataSource } from "./governance-source";
import {
  bundleTarget,
  fakeDataSource,
  makeBundle,
  makeEvent,
  scalarChange,
} from "./explorer.test-helpers";

const NOW = new Date("2024-01-11T00:00:00Z");

const BUNDLES = [
  makeBundle({
    id: "b-old",
    name: "Release",
    projectName: "credit-risk",
    currentStage: "Review",
    createdAt: "2023-12-01T00:00:00Z",
    stages: [{ stageName: "Review", assigneeName: "Alice" }],
  }),
  makeBundle({
    id: "b-new",
    name: "Release",
    projectName: "credit-risk",
    currentStage: "Review",
    createdAt: "2024-01-01T00:00:00Z",
    stages: [{ stageName: "Review", assigneeName: "Bob" }],
  }),
  makeBundle({ id: "b-3", name: "archive", projectName: "analytics", createdAt: null }),
];

const EVENTS = [
  makeEvent({
    timestamp: "2024-01-06T10:00:00Z",
    actionName: "Change Governance Bundle Stage",
    actorName: "bob",
    targets: [bundleTarget("Release", [scalarChange("stage", "Intake", "Review")])],
  }),
  makeEvent({
    timestamp: "2024-01-05T09:00:00Z",
    actionName: "Add Attachment to Bundle",
    actorName: "alice",
    targets: [bundleTarget("Release")],
  }),
];

let app: FastifyInstance | null = null;

async function startApp(dataSource: GovernanceDataSource): Promise<FastifyInstance> {
  app = await buildApp({ logger: false, config: loadConfig({}), dataSource, now: () => NOW });
  return app;
}

describe("explorer API", () => {
  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it("reports health and echoes the request id", async () => {
    const server = await startApp(fakeDataSource([]));
    const res = await server.inject({ method: "GET", url: "/health", headers: { "x-request-id": "req-123" } });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.payload)).toEqual({ status: "ok" });
    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("assigns a request id when none is sent", async () => {
    const server = await startApp(fakeDataSource([]));
    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("serves the all-bundles rows", async () => {
    const source = fakeDataSource(BUNDLES);
    const server = await startApp(source);
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles" });

    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.payload);
    expect(body.rows.map((row: Record<string, string>) => [row["Bundle ID"], row["Current Stage Assignee"]])).toEqual([
      ["b-3", "Unassigned"],
      ["b-old", "Alice"],
      ["b-new", "Bob"],
    ]);
    expect(source.bundleLimits).toEqual([1000]);
  });

  it("serves stage-age metrics", async () => {
    const server = await startApp(fakeDataSource(BUNDLES));
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles/metrics?top=1" });

    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.payload);
    expect(body.rows.map((row: { "Days in Current Stage": number }) => row["Days in Current Stage"])).toEqual([
      41, 10, -1,
    ]);
    expect(body.ranked.map((row: { "Bundle Name": string }) => row["Bundle Name"])).toEqual([
      "Release",
      "Release",
      "archive",
    ]);
    expect(body.top).toHaveLength(1);
    expect(body.chart).toEqual([{ label: "Release", value: 41 }]);
  });

  it("rejects an out-of-range top parameter", async () => {
    const server = await startApp(fakeDataSource(BUNDLES));
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles/metrics?top=0" });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.payload)).toMatchObject({ error: "INVALID_QUERY_PARAMS", statusCode: 400 });
  });

  it("requires a bundle for history", async () => {
    const server = await startApp(fakeDataSource(BUNDLES));
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles/history" });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.payload)).toEqual({
      error: "BUNDLE_REQUIRED",
      message: "Query parameter 'bundle' is required",
      statusCode: 400,
    });
  });

  it("returns 404 for an unknown bundle", async () => {
    const source = fakeDataSource(BUNDLES);
    const server = await startApp(source);
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles/history", query: { bundle: "Nope" } });

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.payload)).toEqual({
      error: "BUNDLE_NOT_FOUND",
      message: "No bundle named 'Nope'",
      statusCode: 404,
    });
    expect(source.auditQueries).toEqual([]);
  });

  it("serves the history of the newest bundle with the name", async () => {
    const source = fakeDataSource(BUNDLES, { events: EVENTS, estimatedMatches: 2 });
    const server = await startApp(source);
    const res = await server.inject({
      method: "GET",
      url: "/api/v1/bundles/history",
      query: {
        bundle: "Release",
        actions: "Change Governance Bundle Stage, ",
        start: "2024-01-05",
        end: "not a date",
      },
    });

    expect(res.statusCode).toBe(200);
    expect(source.auditQueries).toEqual([
      {
        targetType: "governanceBundle",
        targetId: "b-new",
        limit: 500,
        sort: "-timestamp",
        since: "2024-01-05T00:00:00Z",
      },
    ]);
    const body = JSON.parse(res.payload);
    expect(body.bundleId).toBe("b-new");
    expect(body.estimatedMatches).toBe(2);
    expect(body.rows).toHaveLength(1);
    expect(body.rows[0]).toMatchObject({
      "Time (UTC)": "2024-01-06T10:00:00Z",
      "Action": "Change Governance Bundle Stage",
      "Stage": "Intake → Review",
      "User": "bob",
      "Bundle": "Release",
      "Before": "Intake",
      "After": "Review",
      "Change": "stage",
    });
  });

  it("rejects unknown query parameters", async () => {
    const server = await startApp(fakeDataSource(BUNDLES));
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles/history?bundle=Release&verbose=1" });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.payload)).toMatchObject({ error: "INVALID_QUERY_PARAMS", statusCode: 400 });
  });

  it("serves the filter catalog", async () => {
    const server = await startApp(fakeDataSource(BUNDLES));
    const res = await server.inject({ method: "GET", url: "/api/v1/catalog" });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.payload)).toEqual({
      events: [...GOVERNANCE_EVENT_CATALOG],
      bundles: ["archive", "Release"],
      projects: ["analytics", "credit-risk"],
    });
  });

  it("hides internal failures behind INTERNAL_ERROR", async () => {
    const failing: GovernanceDataSource = {
      async listBundles() {
        throw new Error("database password leaked in message");
      },
      async listAuditEvents() {
        return { events: [], estimatedMatches: 0 };
      },
    };
    const server = await startApp(failing);
    const res = await server.inject({ method: "GET", url: "/api/v1/bundles" });

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.payload)).toEqual({
      error: "INTERNAL_ERROR",
      message: "An unexpected error occurred",
      statusCode: 500,
    });
  });

  it("exposes Prometheus metrics", async () => {
    const server = await startApp(fakeDataSource([]));
    await server.inject({ method: "GET", url: "/health" });
    const res = await server.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.payload).toContain('gov_explorer_api_http_requests_total{method="GET",route="/health",status_code="200"}');
  });
});
