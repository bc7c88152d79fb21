import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: "gov_explorer_api_" });

const httpRequestDurationSeconds = new Histogram({
  name: "gov_explorer_api_http_request_duration_seconds",
  help: "HTTP request latency in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: "gov_explorer_api_http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

const httpErrorsTotal = new Counter({
  name: "gov_explorer_api_http_errors_total",
  help: "Total HTTP requests resulting in 5xx responses",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

// ── Outbound HTTP (resilientFetch) metrics ──

const outboundRequestsTotal = new Counter({
  name: "gov_explorer_api_outbound_requests_total",
  help: "Total outbound HTTP requests (includes retries)",
  labelNames: ["host", "result"] as const, // result: success | retry | failure
  registers: [registry],
});

const outboundRetryAttemptsTotal = new Counter({
  name: "gov_explorer_api_outbound_retry_attempts_total",
  help: "Total retry attempts on outbound HTTP requests",
  labelNames: ["host", "reason"] as const, // reason: timeout | 5xx | network
  registers: [registry],
});

const outboundCircuitBreakerState = new Gauge({
  name: "gov_explorer_api_outbound_circuit_breaker_open",
  help: "Whether the circuit breaker is open (1) or closed (0) per host",
  labelNames: ["host"] as const,
  registers: [registry],
});

// ── Governance documents ──

const governanceDocumentsTotal = new Counter({
  name: "gov_explorer_api_governance_documents_total",
  help: "Governance documents received from the data source",
  labelNames: ["kind", "outcome"] as const, // kind: bundle | audit_event; outcome: accepted | rejected
  registers: [registry],
});

const governanceSourceEmptyTotal = new Counter({
  name: "gov_explorer_api_governance_source_empty_total",
  help: "Data source calls that degraded to an empty result",
  labelNames: ["kind", "reason"] as const, // reason: unconfigured | http_status | transport | fixture | envelope
  registers: [registry],
});

export type GovernanceDocumentKind = "bundle" | "audit_event";

export type EmptyResultReason = "unconfigured" | "http_status" | "transport" | "fixture" | "envelope";

export function recordHttpRequestMetric(input: {
  method: string;
  route: string;
  statusCode: number;
  durationSeconds: number;
}): void {
  const labels = {
    method: input.method.toUpperCase(),
    route: input.route,
    status_code: String(input.statusCode),
  };
  httpRequestsTotal.inc(labels, 1);
  httpRequestDurationSeconds.observe(labels, input.durationSeconds);
  if (input.statusCode >= 500) {
    httpErrorsTotal.inc(labels, 1);
  }
}

export function recordOutboundRequest(host: string, result: "success" | "retry" | "failure"): void {
  outboundRequestsTotal.inc({ host, result }, 1);
}

export function recordOutboundRetry(host: string, reason: "timeout" | "5xx" | "network"): void {
  outboundRetryAttemptsTotal.inc({ host, reason }, 1);
}

export function setOutboundCircuitState(host: string, isOpen: boolean): void {
  outboundCircuitBreakerState.set({ host }, isOpen ? 1 : 0);
}

export function recordGovernanceDocuments(
  kind: GovernanceDocumentKind,
  accepted: number,
  rejected: number
): void {
  if (accepted > 0) governanceDocumentsTotal.inc({ kind, outcome: "accepted" }, accepted);
  if (rejected > 0) governanceDocumentsTotal.inc({ kind, outcome: "rejected" }, rejected);
}

export function recordEmptySourceResult(kind: GovernanceDocumentKind, reason: EmptyResultReason): void {
  governanceSourceEmptyTotal.inc({ kind, reason }, 1);
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
