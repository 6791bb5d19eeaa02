import path from "node:path";
import type { RuntimeEnvironment } from "../types/index.js";
import {
  DEFAULT_LOG_FILES,
  DEFAULT_MAX_FILE_SIZE,
  type LogCategory,
} from "../store/LogStore.js";
import {
  DEFAULT_RATE_LIMIT,
  DEFAULT_RATE_WINDOW_MS,
} from "../ingest/rate-limit.js";

export type DiagnosticsChannel = "consola" | "console" | "none";

export interface TelemetryConfig {
  enabled: boolean;
  environment: RuntimeEnvironment;
  host: string;
  port: number;
  /** Route the capture agent posts to. */
  path: string;
  logDirectory: string;
  logFiles: Readonly<Record<LogCategory, string>>;
  maxLogFileSize: number;
  rateLimit: Readonly<{
    limit: number;
    windowMs: number;
    logDenials: boolean;
  }>;
  trustProxy: boolean;
  timeZone?: string;
  diagnostics: DiagnosticsChannel;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const read = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value === "" ? undefined : value;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const value = read(env, key)?.toLowerCase();
  if (value === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${value}"`);
};

const readInteger = (
  env: Env,
  key: string,
  fallback: number,
  { min = 1, max = Number.MAX_SAFE_INTEGER } = {},
): number => {
  const value = read(env, key);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(
      `${key} must be an integer between ${min} and ${max}, got "${value}"`,
    );
  }
  return parsed;
};

const readEnvironment = (env: Env): RuntimeEnvironment => {
  const value = read(env, "NODE_ENV") ?? "development";
  if (value === "development" || value === "production" || value === "test") {
    return value;
  }
  throw new ConfigError(
    `NODE_ENV must be development, production or test, got "${value}"`,
  );
};

const readDiagnostics = (env: Env): DiagnosticsChannel => {
  const value = read(env, "TELEMETRY_DIAGNOSTICS") ?? "consola";
  if (value === "consola" || value === "console" || value === "none") {
    return value;
  }
  throw new ConfigError(
    `TELEMETRY_DIAGNOSTICS must be consola, console or none, got "${value}"`,
  );
};

const readTimeZone = (env: Env): string | undefined => {
  const value = read(env, "LOG_TIMEZONE");
  if (value === undefined) return undefined;
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: value });
  } catch {
    throw new ConfigError(`LOG_TIMEZONE is not a known time zone: "${value}"`);
  }
  return value;
};

const readRoute = (env: Env): string => {
  const value = read(env, "TELEMETRY_PATH") ?? "/logger";
  if (!value.startsWith("/")) {
    throw new ConfigError(`TELEMETRY_PATH must start with "/", got "${value}"`);
  }
  return value;
};

const readFileName = (env: Env, key: string, fallback: string): string => {
  const value = read(env, key) ?? fallback;
  if (path.basename(value) !== value) {
    throw new ConfigError(`${key} must be a file name, got "${value}"`);
  }
  return value;
};

/**
 * Resolves the service configuration from environment variables. The result
 * and its nested objects are frozen; nothing reads the environment after
 * startup.
 * @throws {ConfigError} When a variable is present but malformed.
 */
export function resolveConfig(
  env: Env = process.env,
  cwd: string = process.cwd(),
): Readonly<TelemetryConfig> {
  const config: TelemetryConfig = {
    enabled: readBoolean(env, "TELEMETRY_ENABLED", true),
    environment: readEnvironment(env),
    host: read(env, "HOST") ?? "0.0.0.0",
    port: readInteger(env, "PORT", 8080, { min: 0, max: 65_535 }),
    path: readRoute(env),
    logDirectory: path.resolve(cwd, read(env, "LOG_DIR") ?? "logs"),
    logFiles: Object.freeze({
      application: readFileName(env, "LOG_FILE_APPLICATION", DEFAULT_LOG_FILES.application),
      runtime: readFileName(env, "LOG_FILE_RUNTIME", DEFAULT_LOG_FILES.runtime),
      database: readFileName(env, "LOG_FILE_DATABASE", DEFAULT_LOG_FILES.database),
    }),
    maxLogFileSize: readInteger(env, "LOG_MAX_BYTES", DEFAULT_MAX_FILE_SIZE),
    rateLimit: Object.freeze({
      limit: readInteger(env, "RATE_LIMIT_MAX", DEFAULT_RATE_LIMIT),
      windowMs: readInteger(env, "RATE_LIMIT_WINDOW_MS", DEFAULT_RATE_WINDOW_MS),
      logDenials: readBoolean(env, "RATE_LIMIT_LOG_DENIALS", false),
    }),
    trustProxy: readBoolean(env, "TRUST_PROXY", false),
    timeZone: readTimeZone(env),
    diagnostics: readDiagnostics(env),
    debug: readBoolean(env, "TELEMETRY_DEBUG", false),
  };

  return Object.freeze(config);
}
