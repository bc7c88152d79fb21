/**
 * Governance data source: bundles and audit events from the governance API,
 * or from JSON fixtures when running offline.
 *
 * Every failure degrades to an empty result. Callers cannot tell an empty
 * upstream from an unreachable one.
 */
import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import {
  parseAuditEventDocuments,
  parseBundleDocuments,
  type AuditEvent,
  type Bundle,
  type DocumentParseResult,
} from "@gov-explorer/shared";
import type { GovernanceSourceConfig } from "./config";
import { resilientFetch } from "./http-client";
import { errorMessage, logInfo, logWarn } from "./logger";
import {
  recordEmptySourceResult,
  recordGovernanceDocuments,
  type EmptyResultReason,
  type GovernanceDocumentKind,
} from "./observability/metrics";

export const BUNDLES_PATH = "/api/governance/v1/bundles";
export const AUDIT_EVENTS_PATH = "/api/audittrail/v1/auditevents";
export const BUNDLES_FIXTURE = "sample_bundles.json";
export const EVENTS_FIXTURE = "sample_events.json";

export interface AuditEventQuery {
  targetType: string;
  targetId: string;
  limit: number;
  sort: string;
  since?: string;
  until?: string;
}

export interface AuditEventPage {
  events: AuditEvent[];
  estimatedMatches: number;
}

export interface GovernanceDataSource {
  listBundles(limit: number): Promise<Bundle[]>;
  listAuditEvents(query: AuditEventQuery): Promise<AuditEventPage>;
}

const BundleEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  bundles: z.unknown().optional(),
});

const AuditEventEnvelopeSchema = z.object({
  events: z.array(z.unknown()).default([]),
  estimatedMatches: z.number().int().nonnegative().catch(0),
});

type AuditEventEnvelope = z.infer<typeof AuditEventEnvelopeSchema>;

/** `data` wins when it is a non-empty array, then `bundles`. */
function bundleDocumentsOf(envelope: z.infer<typeof BundleEnvelopeSchema>): unknown[] {
  for (const candidate of [envelope.data, envelope.bundles]) {
    if (Array.isArray(candidate) && candidate.length > 0) return candidate;
  }
  return [];
}

function emptyPage(): AuditEventPage {
  return { events: [], estimatedMatches: 0 };
}

class SourceUnavailableError extends Error {
  constructor(readonly reason: EmptyResultReason, message: string) {
    super(message);
    this.name = "SourceUnavailableError";
  }
}

function degrade(kind: GovernanceDocumentKind, error: unknown): void {
  const reason = error instanceof SourceUnavailableError ? error.reason : "transport";
  recordEmptySourceResult(kind, reason);
  logWarn("Governance data source returned no documents", {
    kind,
    reason,
    error: errorMessage(error),
  });
}

function accept<T>(kind: GovernanceDocumentKind, result: DocumentParseResult<T>): T[] {
  recordGovernanceDocuments(kind, result.items.length, result.rejected);
  if (result.rejected > 0) {
    logWarn("Dropped malformed governance documents", {
      kind,
      rejected: result.rejected,
      issues: result.issues.slice(0, 5).map((issue) => issue.message),
    });
  }
  return result.items;
}

function parseEnvelope<S extends z.ZodTypeAny>(schema: S, body: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new SourceUnavailableError("envelope", `Unexpected response shape from ${source}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Online
// ---------------------------------------------------------------------------

function createHttpSource(config: GovernanceSourceConfig): GovernanceDataSource {
  async function getJson(pathname: string, params: URLSearchParams): Promise<unknown> {
    if (!config.baseUrl) {
      throw new SourceUnavailableError("unconfigured", "GOVERNANCE_API_URL is not set");
    }
    const url = `${config.baseUrl}${pathname}?${params.toString()}`;
    const response = await resilientFetch(url, {
      method: "GET",
      headers: {
        [config.apiKeyHeader]: config.apiKey,
        Accept: "application/json",
      },
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
    });
    if (response.status !== 200) {
      await response.body?.cancel();
      throw new SourceUnavailableError("http_status", `${pathname} responded with HTTP ${response.status}`);
    }
    try {
      return await response.json();
    } catch (error) {
      throw new SourceUnavailableError("envelope", `${pathname} returned invalid JSON: ${errorMessage(error)}`);
    }
  }

  return {
    async listBundles(limit) {
      try {
        const body = await getJson(BUNDLES_PATH, new URLSearchParams({ limit: String(limit) }));
        const envelope = parseEnvelope(BundleEnvelopeSchema, body, BUNDLES_PATH);
        return accept("bundle", parseBundleDocuments(bundleDocumentsOf(envelope)));
      } catch (error) {
        degrade("bundle", error);
        return [];
      }
    },

    async listAuditEvents(query) {
      const params = new URLSearchParams({
        targetType: query.targetType,
        targetId: query.targetId,
        limit: String(query.limit),
        sort: query.sort,
      });
      if (query.since) params.set("since", query.since);
      if (query.until) params.set("until", query.until);
      try {
        const body = await getJson(AUDIT_EVENTS_PATH, params);
        const envelope: AuditEventEnvelope = parseEnvelope(AuditEventEnvelopeSchema, body, AUDIT_EVENTS_PATH);
        return {
          events: accept("audit_event", parseAuditEventDocuments(envelope.events)),
          estimatedMatches: envelope.estimatedMatches,
        };
      } catch (error) {
        degrade("audit_event", error);
        return emptyPage();
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Offline fixtures
// ---------------------------------------------------------------------------

function createFixtureSource(fixturesDir: string): GovernanceDataSource {
  async function readFixture(fileName: string): Promise<unknown> {
    const filePath = path.join(fixturesDir, fileName);
    try {
      return JSON.parse(await readFile(filePath, "utf8"));
    } catch (error) {
      throw new SourceUnavailableError("fixture", `Cannot read ${filePath}: ${errorMessage(error)}`);
    }
  }

  return {
    async listBundles(limit) {
      try {
        const envelope = parseEnvelope(BundleEnvelopeSchema, await readFixture(BUNDLES_FIXTURE), BUNDLES_FIXTURE);
        return accept("bundle", parseBundleDocuments(bundleDocumentsOf(envelope).slice(0, limit)));
      } catch (error) {
        degrade("bundle", error);
        return [];
      }
    },

    // The fixture is a recorded response; it is returned whole, whatever the query.
    async listAuditEvents() {
      try {
        const envelope: AuditEventEnvelope = parseEnvelope(
          AuditEventEnvelopeSchema,
          await readFixture(EVENTS_FIXTURE),
          EVENTS_FIXTURE
        );
        return {
          events: accept("audit_event", parseAuditEventDocuments(envelope.events)),
          estimatedMatches: envelope.estimatedMatches,
        };
      } catch (error) {
        degrade("audit_event", error);
        return emptyPage();
      }
    },
  };
}

export function createGovernanceDataSource(config: GovernanceSourceConfig): GovernanceDataSource {
  if (config.offline) {
    logInfo("Governance data source running offline", { fixturesDir: config.fixturesDir });
    return createFixtureSource(config.fixturesDir);
  }
  return createHttpSource(config);
}
