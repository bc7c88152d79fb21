import { FastifyInstance } from "fastify";
import type { AppConfig } from "../config";
import { send400, send404 } from "../errors";
import type { GovernanceDataSource } from "../governance-source";
import { buildAuditEventQuery, resolveHistoryWindow, selectBundleForHistory } from "../history-query";
import { setLogContext } from "../log-context";
import { logInfo } from "../logger";
import {
  DEFAULT_TOP_STALLED,
  buildAllBundlesRows,
  buildHistoryRows,
  buildMetricsRows,
  rankByDaysInStage,
  toBarChartSeries,
  topStalledBundles,
} from "../view-rows";

export interface ExplorerRouteDeps {
  dataSource: GovernanceDataSource;
  limits: AppConfig["limits"];
  /** Clock used for age-in-stage. */
  now: () => Date;
}

type MetricsQuery = { top?: number };

type HistoryQuery = {
  bundle?: string;
  actions?: string;
  projects?: string;
  start?: string;
  end?: string;
};

const metricsSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      top: { type: "integer", minimum: 1, maximum: 500 },
    },
  },
} as const;

const historySchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      bundle: { type: "string", maxLength: 512 },
      actions: { type: "string", maxLength: 4096 },
      projects: { type: "string", maxLength: 4096 },
      start: { type: "string", maxLength: 64 },
      end: { type: "string", maxLength: 64 },
    },
  },
} as const;

/** "a, b,,c" -> ["a", "b", "c"]; blank input means no filter. */
export function splitList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const values = raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
  return values.length > 0 ? values : undefined;
}

export async function registerBundleRoutes(app: FastifyInstance, deps: ExplorerRouteDeps) {
  app.get("/api/v1/bundles", async () => {
    setLogContext({ view: "bundles" });
    const bundles = await deps.dataSource.listBundles(deps.limits.bundles);
    return { rows: buildAllBundlesRows(bundles) };
  });

  app.get<{ Querystring: MetricsQuery }>(
    "/api/v1/bundles/metrics",
    { schema: metricsSchema },
    async (request) => {
      setLogContext({ view: "metrics" });
      const bundles = await deps.dataSource.listBundles(deps.limits.bundles);
      const rows = buildMetricsRows(bundles, deps.now());
      const top = topStalledBundles(rows, request.query.top ?? DEFAULT_TOP_STALLED);
      return {
        rows,
        ranked: rankByDaysInStage(rows),
        top,
        chart: toBarChartSeries(top),
      };
    }
  );

  app.get<{ Querystring: HistoryQuery }>(
    "/api/v1/bundles/history",
    { schema: historySchema },
    async (request, reply) => {
      setLogContext({ view: "history" });
      const bundleName = request.query.bundle?.trim() ?? "";
      if (!bundleName) {
        return send400(reply, "BUNDLE_REQUIRED", "Query parameter 'bundle' is required");
      }

      const bundles = await deps.dataSource.listBundles(deps.limits.bundles);
      const bundle = selectBundleForHistory(bundles, bundleName);
      if (!bundle || !bundle.id) {
        return send404(reply, "BUNDLE_NOT_FOUND", `No bundle named '${bundleName}'`);
      }

      const window = resolveHistoryWindow({ start: request.query.start, end: request.query.end });
      const page = await deps.dataSource.listAuditEvents(
        buildAuditEventQuery(bundle.id, window, deps.limits.auditEvents)
      );
      const rows = buildHistoryRows(page.events, {
        actionNames: splitList(request.query.actions),
        projectNames: splitList(request.query.projects),
      });
      logInfo("Bundle history assembled", {
        bundleId: bundle.id,
        events: page.events.length,
        rows: rows.length,
      });
      return { bundleId: bundle.id, rows, estimatedMatches: page.estimatedMatches };
    }
  );
}
