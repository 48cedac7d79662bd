import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";

/** Token value shipped in example deployments; treated the same as no token. */
export const PLACEHOLDER_TOKEN = "asdf";

const TesConfigSchema = z.object({
  url: z.string().optional(),
  token: z.string().optional(),
  request_timeout_seconds: z.coerce.number().default(60),
  max_retries: z.coerce.number().int().default(3),
  backoff_factor: z.coerce.number().default(1.0),
});

const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().default(8080),
  transport: z.enum(["http", "stdio"]).default("http"),
});

const PollingConfigSchema = z.object({
  interval_seconds: z.coerce.number().int().default(5),
  // 10 minutes with 5s intervals
  max_attempts: z.coerce.number().int().default(120),
});

const AppConfigSchema = z.object({
  tes: TesConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  polling: PollingConfigSchema.default({}),
  log_level: z.string().default("info"),
});

export type AppConfig = Readonly<z.infer<typeof AppConfigSchema>>;
export type TesConfig = z.infer<typeof TesConfigSchema>;

export interface ConfigIssues {
  errors: string[];
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from an optional YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const path = options.configPath ?? env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const loaded: unknown = yaml.load(readFileSync(path, "utf-8"));
    if (isRecord(loaded)) {
      rawConfig = loaded;
    }
  }

  applyEnvOverrides(rawConfig, env);

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  const tes = ensureObject(config, "tes");
  const server = ensureObject(config, "server");
  const polling = ensureObject(config, "polling");

  // TES service
  if (env.TES_URL) tes.url = env.TES_URL;
  const token = env.TES_TOKEN || env.TES_AUTH_TOKEN;
  if (token) tes.token = token;
  if (env.TES_REQUEST_TIMEOUT) tes.request_timeout_seconds = env.TES_REQUEST_TIMEOUT;
  if (env.TES_MAX_RETRIES) tes.max_retries = env.TES_MAX_RETRIES;
  if (env.TES_BACKOFF_FACTOR) tes.backoff_factor = env.TES_BACKOFF_FACTOR;

  // MCP server
  if (env.MCP_HOST) server.host = env.MCP_HOST;
  if (env.MCP_PORT) server.port = env.MCP_PORT;
  if (env.MCP_TRANSPORT) server.transport = env.MCP_TRANSPORT.toLowerCase();

  // Polling
  if (env.TASK_POLL_INTERVAL) polling.interval_seconds = env.TASK_POLL_INTERVAL;
  if (env.TASK_POLL_MAX_ATTEMPTS) polling.max_attempts = env.TASK_POLL_MAX_ATTEMPTS;

  if (env.LOG_LEVEL) config.log_level = env.LOG_LEVEL;
}

/** Range checks that zod parsing alone does not express. */
export function validateConfig(config: AppConfig): ConfigIssues {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.tes.url) {
    errors.push("TES_URL environment variable is required");
  }

  if (!config.tes.token || config.tes.token === PLACEHOLDER_TOKEN) {
    warnings.push("TES_TOKEN environment variable should be set for secure authentication");
  }

  if (config.tes.request_timeout_seconds <= 0) {
    errors.push("TES_REQUEST_TIMEOUT must be a positive integer");
  }

  if (config.tes.max_retries < 0) {
    errors.push("TES_MAX_RETRIES must be a non-negative integer");
  }

  if (config.tes.backoff_factor <= 0) {
    errors.push("TES_BACKOFF_FACTOR must be a positive number");
  }

  if (config.server.port <= 0 || config.server.port > 65535) {
    errors.push("MCP_PORT must be a valid port number (1-65535)");
  }

  if (config.polling.interval_seconds <= 0) {
    errors.push("TASK_POLL_INTERVAL must be a positive integer");
  }

  if (config.polling.max_attempts <= 0) {
    errors.push("TASK_POLL_MAX_ATTEMPTS must be a positive integer");
  }

  return { errors, warnings };
}

/** Configuration rendered for logging, with the token masked. */
export function getMaskedConfig(config: AppConfig): Record<string, string> {
  const token = config.tes.token;
  const maskedToken = token && token !== PLACEHOLDER_TOKEN ? "***MASKED***" : token;

  return {
    TES_URL: config.tes.url ?? "NOT_SET",
    TES_TOKEN: maskedToken || "NOT_SET",
    TES_REQUEST_TIMEOUT: String(config.tes.request_timeout_seconds),
    TES_MAX_RETRIES: String(config.tes.max_retries),
    TES_BACKOFF_FACTOR: String(config.tes.backoff_factor),
    MCP_HOST: config.server.host,
    MCP_PORT: String(config.server.port),
    MCP_TRANSPORT: config.server.transport,
    LOG_LEVEL: config.log_level,
    TASK_POLL_INTERVAL: String(config.polling.interval_seconds),
    TASK_POLL_MAX_ATTEMPTS: String(config.polling.max_attempts),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}
