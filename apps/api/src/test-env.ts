import { afterEach } from "vitest";
import { setLogSink } from "./logger";

/**
 * Test runtime env preflight.
 *
 * Suites must never reach a real governance API or pick up a developer's
 * `.env`, so the upstream settings are pinned to inert values here.
 */
process.env.NODE_ENV = "test";
process.env.OTEL_ENABLED = "false";
process.env.GOVERNANCE_API_URL = "";
process.env.GOVERNANCE_API_KEY = "test-secret";
process.env.GOVERNANCE_OFFLINE = "false";

if (!process.env.ALLOWED_ORIGINS) {
  process.env.ALLOWED_ORIGINS = "http://localhost:5173";
}

// Structured log lines stay out of the reporter output unless a test captures them.
setLogSink(() => undefined);

afterEach(() => {
  setLogSink(() => undefined);
});
