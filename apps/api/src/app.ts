import { randomUUID } from "node:crypto";
import Fastify, { FastifyInstance, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { loadConfig, type AppConfig } from "./config";
import { send400, sendError } from "./errors";
import { createGovernanceDataSource, type GovernanceDataSource } from "./governance-source";
import { logError } from "./logger";
import { setLogContext } from "./log-context";
import {
  getMetricsContentType,
  getMetricsSnapshot,
  recordHttpRequestMetric,
} from "./observability/metrics";
import { registerBundleRoutes } from "./routes/bundle.routes";
import { registerCatalogRoutes } from "./routes/catalog.routes";

export interface BuildAppOptions {
  /** Fastify access logging (default: true). */
  logger?: boolean;
  /** Defaults to `loadConfig(process.env)`. */
  config?: AppConfig;
  /** Defaults to the configured governance API or offline fixtures. */
  dataSource?: GovernanceDataSource;
  /** Clock for age-in-stage; defaults to the wall clock. */
  now?: () => Date;
}

const DEFAULT_API_SUCCESS_RESPONSE_SCHEMA = {
  type: "object",
  additionalProperties: true,
  description: "Generic success payload.",
};

const DEFAULT_API_ERROR_RESPONSE_SCHEMA = {
  type: "object",
  required: ["error", "message", "statusCode"],
  additionalProperties: false,
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    statusCode: { type: "integer", minimum: 400, maximum: 599 },
  },
};

const DEFAULT_API_ERROR_RESPONSE_STATUS_CODES = ["400", "404", "500"] as const;

function isPlainObject(node: unknown): node is Record<string, unknown> {
  return Boolean(node) && typeof node === "object" && !Array.isArray(node);
}

function inferApiTag(url: string): string {
  if (url.startsWith("/api/v1/bundles")) return "bundles";
  if (url.startsWith("/api/v1/catalog")) return "catalog";
  return "api";
}

function inferOperationId(method: string, url: string): string {
  const cleanedPath = url
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replace(/[^A-Za-z0-9]+/g, "_"))
    .join("_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${method.toLowerCase()}_${cleanedPath}` || `${method.toLowerCase()}_root`;
}

function ensureOpenApiContractDefaults(input: {
  schema: unknown;
  url: string;
  method: string;
}): Record<string, unknown> {
  const nextSchema: Record<string, unknown> = isPlainObject(input.schema) ? { ...input.schema } : {};
  if (!input.url.startsWith("/api/v1/")) {
    return nextSchema;
  }

  const currentOperationId = nextSchema.operationId;
  if (typeof currentOperationId !== "string" || currentOperationId.trim().length === 0) {
    nextSchema.operationId = inferOperationId(input.method, input.url);
  }
  const currentTags = nextSchema.tags;
  if (!Array.isArray(currentTags) || currentTags.length === 0) {
    nextSchema.tags = [inferApiTag(input.url)];
  }

  const responseSchemas: Record<string, unknown> = isPlainObject(nextSchema.response)
    ? { ...nextSchema.response }
    : {};
  const has2xx = Object.keys(responseSchemas).some((statusCode) => /^2\d\d$/.test(statusCode));
  if (!has2xx) {
    responseSchemas["200"] = DEFAULT_API_SUCCESS_RESPONSE_SCHEMA;
  }
  for (const statusCode of DEFAULT_API_ERROR_RESPONSE_STATUS_CODES) {
    if (!responseSchemas[statusCode]) {
      responseSchemas[statusCode] = DEFAULT_API_ERROR_RESPONSE_SCHEMA;
    }
  }
  nextSchema.response = responseSchemas;
  return nextSchema;
}

function routeLabelForMetrics(request: FastifyRequest): string {
  const routeUrl = request.routeOptions.url;
  if (routeUrl) return routeUrl;
  const rawPath = request.url.split("?")[0];
  return rawPath || "UNKNOWN_ROUTE";
}

function routeMethodOf(route: unknown): string {
  if (!isPlainObject(route)) return "GET";
  const method = route.method;
  if (Array.isArray(method)) return String(method[0] ?? "GET").toUpperCase();
  return method == null ? "GET" : String(method).toUpperCase();
}

/** Build and return the Fastify app with all routes (no listen). Used by server and tests. */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const dataSource = options.dataSource ?? createGovernanceDataSource(config.governance);
  const now = options.now ?? (() => new Date());
  const requestStartedAt = new WeakMap<FastifyRequest, bigint>();

  const app = Fastify({
    logger: options.logger ?? true,
    requestIdHeader: "x-request-id",
    genReqId: (req) => {
      const incomingHeader = req.headers["x-request-id"];
      if (typeof incomingHeader === "string" && incomingHeader.trim().length > 0) {
        return incomingHeader.trim();
      }
      if (Array.isArray(incomingHeader) && incomingHeader[0]?.trim().length) {
        return incomingHeader[0].trim();
      }
      return randomUUID();
    },
    ajv: {
      customOptions: {
        // Strict querystrings (additionalProperties: false) must reject unknown keys.
        removeAdditional: false,
      },
    },
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartedAt.set(request, process.hrtime.bigint());
    setLogContext({ requestId: request.id });
    reply.header("x-request-id", request.id);
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.setAttribute("request.id", request.id);
    }
  });

  app.addHook("onError", async (request, _reply, error) => {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.recordException(error);
      activeSpan.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    }
    setLogContext({ requestId: request.id });
  });

  app.addHook("onResponse", async (request, reply) => {
    setLogContext({ requestId: request.id });
    const startedAt = requestStartedAt.get(request);
    if (startedAt === undefined) return;
    const elapsedNs = process.hrtime.bigint() - startedAt;
    recordHttpRequestMetric({
      method: request.method,
      route: routeLabelForMetrics(request),
      statusCode: reply.statusCode,
      durationSeconds: Number(elapsedNs) / 1_000_000_000,
    });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Governance Explorer API",
        description: "Derived bundle, history and metrics rows for the governance explorer.",
        version: "1.0.0",
      },
      tags: [
        { name: "health", description: "Service health" },
        { name: "bundles", description: "Bundle overview, history and stage-age metrics" },
        { name: "catalog", description: "Filter options for the history view" },
      ],
    },
    transform: ({ schema, url, route }) => {
      const transformedSchema = ensureOpenApiContractDefaults({
        schema,
        url,
        method: routeMethodOf(route),
      });
      return { schema: transformedSchema, url };
    },
  });

  if (config.server.docsEnabled) {
    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: false,
      },
      staticCSP: true,
      transformStaticCSP: (header) => header,
    });
  }

  app.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      const context = error.validationContext;
      const errorCode =
        context === "querystring"
          ? "INVALID_QUERY_PARAMS"
          : context === "params"
            ? "INVALID_PATH_PARAMS"
            : "INVALID_REQUEST_BODY";
      return reply.send(send400(reply, errorCode, error.message || "Request validation failed"));
    }
    // Never expose internal error details to clients
    logError("Unhandled request error", {
      message: error.message,
      stack: error.stack,
      statusCode: error.statusCode,
    });
    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      return reply.send(sendError(reply, 500, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
    // 4xx raised by Fastify itself (e.g. 404, 413)
    return reply.send(sendError(reply, statusCode, error.code || "ERROR", error.message));
  });

  await app.register(cors, { origin: config.server.allowedOrigins });

  app.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok" };
  });

  app.get(
    "/metrics",
    {
      schema: {
        querystring: {
          type: "object",
          additionalProperties: false,
          properties: {},
        },
      },
    },
    async (_request, reply) => {
      reply.header("content-type", getMetricsContentType());
      reply.header("cache-control", "no-store");
      return getMetricsSnapshot();
    }
  );

  const routeDeps = { dataSource, limits: config.limits, now };
  await registerBundleRoutes(app, routeDeps);
  await registerCatalogRoutes(app, routeDeps);

  return app;
}
