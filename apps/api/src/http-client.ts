/**
 * Resilient outbound HTTP client with timeout, retry, and circuit breaker.
 * Used for the governance and audit trail APIs.
 */
import { logWarn, logError, errorMessage } from "./logger";
import {
  recordOutboundRequest,
  recordOutboundRetry,
  setOutboundCircuitState,
} from "./observability/metrics";

export interface ResilientFetchOptions extends RequestInit {
  /** Timeout in milliseconds (default: 30_000) */
  timeoutMs?: number;
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** Whether to retry on 5xx status codes (default: true) */
  retryOn5xx?: boolean;
  /** First backoff delay; doubles per attempt up to 8x (default: 500) */
  retryDelayMs?: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly host: string) {
    super(`Circuit breaker open for ${host}: upstream service unavailable`);
    this.name = "CircuitOpenError";
  }
}

interface CircuitState {
  failures: number;
  lastFailure: number;
  isOpen: boolean;
}

const circuits = new Map<string, CircuitState>();
const CIRCUIT_FAILURE_THRESHOLD = 5;
const CIRCUIT_RESET_MS = 60_000; // 1 minute half-open

function getCircuit(host: string): CircuitState {
  let state = circuits.get(host);
  if (!state) {
    state = { failures: 0, lastFailure: 0, isOpen: false };
    circuits.set(host, state);
  }
  return state;
}

function recordSuccess(host: string): void {
  const state = getCircuit(host);
  state.failures = 0;
  if (state.isOpen) setOutboundCircuitState(host, false);
  state.isOpen = false;
}

function recordFailure(host: string): void {
  const state = getCircuit(host);
  state.failures++;
  state.lastFailure = Date.now();
  if (state.failures >= CIRCUIT_FAILURE_THRESHOLD && !state.isOpen) {
    state.isOpen = true;
    setOutboundCircuitState(host, true);
    logWarn("Circuit breaker opened", { host, failures: state.failures });
  }
}

function isCircuitOpen(host: string): boolean {
  const state = getCircuit(host);
  if (!state.isOpen) return false;
  // Allow half-open after reset period
  if (Date.now() - state.lastFailure > CIRCUIT_RESET_MS) {
    return false;
  }
  return true;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch with timeout, bounded retries, and circuit breaker.
 */
export async function resilientFetch(
  url: string,
  options: ResilientFetchOptions = {}
): Promise<Response> {
  const {
    timeoutMs = 30_000,
    maxRetries = 3,
    retryOn5xx = true,
    retryDelayMs = 500,
    ...fetchInit
  } = options;

  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    host = url;
  }

  if (isCircuitOpen(host)) {
    throw new CircuitOpenError(host);
  }

  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      // Exponential backoff: base, 2x, 4x, capped at 8x
      await sleep(Math.min(retryDelayMs * Math.pow(2, attempt - 1), retryDelayMs * 8));
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        ...fetchInit,
        signal: controller.signal,
      });
      clearTimeout(timeoutId);

      if (retryOn5xx && response.status >= 500 && attempt < maxRetries) {
        lastError = new Error(`HTTP ${response.status} from ${host}`);
        recordFailure(host);
        recordOutboundRequest(host, "retry");
        recordOutboundRetry(host, "5xx");
        await response.body?.cancel();
        continue;
      }

      recordSuccess(host);
      recordOutboundRequest(host, "success");
      return response;
    } catch (err: unknown) {
      clearTimeout(timeoutId);
      recordFailure(host);
      const timedOut = isAbortError(err);
      lastError = timedOut
        ? new Error(`Request to ${host} timed out after ${timeoutMs}ms`)
        : new Error(errorMessage(err));

      if (attempt < maxRetries) {
        recordOutboundRequest(host, "retry");
        recordOutboundRetry(host, timedOut ? "timeout" : "network");
        logWarn("Outbound request failed, retrying", {
          host,
          attempt: attempt + 1,
          error: lastError.message,
        });
        continue;
      }
    }
  }

  recordOutboundRequest(host, "failure");
  logError("Outbound request failed after all retries", {
    host,
    maxRetries,
    error: lastError?.message,
  });
  throw lastError ?? new Error(`Request to ${host} failed`);
}

/** Reset all circuit breakers (for testing). */
export function resetCircuits(): void {
  circuits.clear();
}
