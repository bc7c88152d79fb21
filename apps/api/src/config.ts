/**
 * Runtime configuration, read once from the environment and validated.
 */
import path from "path";
import { z } from "zod";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

export const DEFAULT_API_KEY_HEADER = "X-Domino-Api-Key";
export const DEFAULT_FIXTURES_DIR = path.resolve(__dirname, "..", "fixtures");

/** Blank variables count as unset. */
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
    schema
  );
}

const BooleanFlag = optionalEnv(
  z
    .string()
    .optional()
    .transform((value) => (value ? TRUE_VALUES.has(value.trim().toLowerCase()) : false))
);

const EnvSchema = z.object({
  GOVERNANCE_API_URL: optionalEnv(z.string().trim().url().optional()),
  GOVERNANCE_API_KEY: z.string().default(""),
  GOVERNANCE_API_KEY_HEADER: optionalEnv(z.string().trim().min(1).default(DEFAULT_API_KEY_HEADER)),
  GOVERNANCE_OFFLINE: BooleanFlag,
  GOVERNANCE_FIXTURES_DIR: optionalEnv(z.string().trim().min(1).optional()),
  GOVERNANCE_REQUEST_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive().default(30_000)),
  GOVERNANCE_MAX_RETRIES: optionalEnv(z.coerce.number().int().min(0).max(10).default(3)),
  BUNDLE_FETCH_LIMIT: optionalEnv(z.coerce.number().int().positive().default(1000)),
  AUDIT_EVENT_LIMIT: optionalEnv(z.coerce.number().int().positive().default(500)),
  PORT: optionalEnv(z.coerce.number().int().min(1).max(65535).optional()),
  API_PORT: optionalEnv(z.coerce.number().int().min(1).max(65535).default(3001)),
  API_BIND_HOST: optionalEnv(z.string().trim().min(1).default("0.0.0.0")),
  ALLOWED_ORIGINS: optionalEnv(z.string().optional()),
  ENABLE_API_DOCS: BooleanFlag,
  NODE_ENV: optionalEnv(z.string().optional()),
});

export interface GovernanceSourceConfig {
  /** null when no upstream is configured; online calls then return nothing. */
  baseUrl: string | null;
  apiKey: string;
  apiKeyHeader: string;
  offline: boolean;
  fixturesDir: string;
  requestTimeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  governance: GovernanceSourceConfig;
  limits: {
    bundles: number;
    auditEvents: number;
  };
  server: {
    port: number;
    host: string;
    /** `true` reflects any origin. */
    allowedOrigins: string[] | true;
    docsEnabled: boolean;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

function parseOrigins(raw: string | undefined): string[] | true {
  if (!raw) return true;
  const origins = raw
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : true;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const values = parsed.data;
  return {
    governance: {
      baseUrl: values.GOVERNANCE_API_URL ? values.GOVERNANCE_API_URL.replace(/\/+$/, "") : null,
      apiKey: values.GOVERNANCE_API_KEY,
      apiKeyHeader: values.GOVERNANCE_API_KEY_HEADER,
      offline: values.GOVERNANCE_OFFLINE,
      fixturesDir: values.GOVERNANCE_FIXTURES_DIR
        ? path.resolve(values.GOVERNANCE_FIXTURES_DIR)
        : DEFAULT_FIXTURES_DIR,
      requestTimeoutMs: values.GOVERNANCE_REQUEST_TIMEOUT_MS,
      maxRetries: values.GOVERNANCE_MAX_RETRIES,
    },
    limits: {
      bundles: values.BUNDLE_FETCH_LIMIT,
      auditEvents: values.AUDIT_EVENT_LIMIT,
    },
    server: {
      port: values.PORT ?? values.API_PORT,
      host: values.API_BIND_HOST,
      allowedOrigins: parseOrigins(values.ALLOWED_ORIGINS),
      docsEnabled: values.ENABLE_API_DOCS || values.NODE_ENV !== "production",
    },
  };
}
