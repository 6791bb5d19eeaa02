import type { TelemetryConfig } from "../config/config.js";
import { createLogger } from "../core/logger/Logger.js";
import { FixedWindowLimiter, type RateLimitStore } from "../ingest/rate-limit.js";
import { ConsolaProvider } from "../providers/ConsolaProvider.js";
import { ConsoleProvider } from "../providers/ConsoleProvider.js";
import { FileProvider } from "../providers/FileProvider.js";
import { LOG_CATEGORIES, LogStore, type LogCategory } from "../store/LogStore.js";
import type { Logger, TelemetryProvider } from "../types/index.js";

/**
 * Process-wide collaborators of the ingestion route. Built once at startup
 * and passed into the request path; nothing here is a module global.
 */
export interface TelemetryServices {
  config: Readonly<TelemetryConfig>;
  store: LogStore;
  limiter: FixedWindowLimiter;
  /** Diagnostics plus the category's own log file. */
  loggers: Record<LogCategory, Logger>;
  flush(): Promise<void>;
}

export interface ServiceOverrides {
  /** Replaces the configured diagnostic channel (tests pass a collector). */
  diagnostics?: TelemetryProvider[];
  rateLimitStore?: RateLimitStore;
  now?: () => Date;
}

const diagnosticProviders = (
  config: Readonly<TelemetryConfig>,
): TelemetryProvider[] => {
  switch (config.diagnostics) {
    case "consola": {
      return [new ConsolaProvider({ tag: "telemetry", debug: config.debug })];
    }
    case "console": {
      return [new ConsoleProvider({ debug: config.debug })];
    }
    case "none": {
      return [];
    }
  }
};

export function createServices(
  config: Readonly<TelemetryConfig>,
  overrides: ServiceOverrides = {},
): TelemetryServices {
  const diagnostics = overrides.diagnostics ?? diagnosticProviders(config);
  const now = overrides.now ?? (() => new Date());

  let rotationLogger: Logger | undefined;

  const store = new LogStore({
    directory: config.logDirectory,
    files: config.logFiles,
    maxFileSize: config.maxLogFileSize,
    now,
    onRotate: (category, rotatedPath) => {
      rotationLogger?.info(`Log file rotated to: ${rotatedPath}`, {
        context: { category },
      });
    },
  });

  const categoryLogger = (category: LogCategory): Logger => {
    const providers = config.enabled
      ? [
          ...diagnostics,
          new FileProvider({ store, category, timeZone: config.timeZone }),
        ]
      : diagnostics;
    return createLogger(providers, {
      environment: config.environment,
      defaultTags: { category },
    });
  };

  const loggers: Record<LogCategory, Logger> = {
    application: categoryLogger("application"),
    runtime: categoryLogger("runtime"),
    database: categoryLogger("database"),
  };
  rotationLogger = loggers.runtime;

  const limiter = new FixedWindowLimiter({
    limit: config.rateLimit.limit,
    windowMs: config.rateLimit.windowMs,
    store: overrides.rateLimitStore,
    now: () => now().getTime(),
  });

  return {
    config,
    store,
    limiter,
    loggers,
    flush: async () => {
      await Promise.all(LOG_CATEGORIES.map((category) => loggers[category].flush()));
    },
  };
}
