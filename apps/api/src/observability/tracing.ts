import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { errorMessage, logError } from "../logger";

const DEFAULT_SERVICE_NAME = "governance-explorer-api";

let sdk: NodeSDK | null = null;
let started = false;

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  ALL: DiagLogLevel.ALL,
  VERBOSE: DiagLogLevel.VERBOSE,
  DEBUG: DiagLogLevel.DEBUG,
  INFO: DiagLogLevel.INFO,
  WARN: DiagLogLevel.WARN,
  ERROR: DiagLogLevel.ERROR,
  NONE: DiagLogLevel.NONE,
};

function parseDiagLogLevel(rawLevel: string | undefined): DiagLogLevel | null {
  if (!rawLevel) return null;
  return DIAG_LEVELS[rawLevel.trim().toUpperCase()] ?? null;
}

export function shouldEnableTracing(env: NodeJS.ProcessEnv = process.env): boolean {
  const explicit = env.OTEL_ENABLED;
  if (explicit === "false") return false;
  if (explicit === "true") return true;
  // Default: enable only in non-test runtime.
  return env.NODE_ENV !== "test" && env.VITEST !== "true";
}

function buildTraceExporter(env: NodeJS.ProcessEnv): OTLPTraceExporter | undefined {
  const endpoint = env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!endpoint || endpoint.trim().length === 0) return undefined;
  return new OTLPTraceExporter({ url: endpoint.trim() });
}

export function startTracing(env: NodeJS.ProcessEnv = process.env): void {
  if (started) return;
  if (!shouldEnableTracing(env)) return;

  const diagLevel = parseDiagLogLevel(env.OTEL_DIAG_LOG_LEVEL);
  if (diagLevel != null) {
    diag.setLogger(new DiagConsoleLogger(), diagLevel);
  }

  try {
    sdk = new NodeSDK({
      serviceName: env.OTEL_SERVICE_NAME || DEFAULT_SERVICE_NAME,
      traceExporter: buildTraceExporter(env),
      instrumentations: [
        new FastifyInstrumentation({
          requestHook: (span, info) => {
            const reqId = String(info.request.id || "").trim();
            if (reqId) {
              span.setAttribute("request.id", reqId);
            }
          },
        }),
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          // Fastify is explicitly instrumented above to inject request.id attributes.
          "@opentelemetry/instrumentation-fastify": { enabled: false },
        }),
      ],
    });
    sdk.start();
    started = true;
  } catch (error) {
    // Tracing must never block API startup.
    logError("Failed to initialize OpenTelemetry tracing", { error: errorMessage(error) });
  }
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk || !started) return;
  await sdk.shutdown();
  started = false;
  sdk = null;
}
