import type {
  LogEvent,
  LogLevel,
  Logger as LoggerInterface,
  LoggerConfig,
  LoggerScope,
  LogOptions,
  RuntimeEnvironment,
  TagRecord,
  TelemetryProvider,
} from "../../types/index.js";

type ConsoleLike = {
  error: (...args: unknown[]) => void;
};

const globalEnv =
  (globalThis as { process?: { env?: Record<string, string | undefined> } })
    .process?.env ?? {};

const diagnosticConsole =
  (globalThis as unknown as { console?: ConsoleLike }).console ??
  ({ error: () => {} } satisfies ConsoleLike);

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isEnvironment = (value: string | undefined): value is RuntimeEnvironment =>
  value === "development" || value === "production" || value === "test";

export const levelEnabled = (level: LogLevel, minLevel: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

/**
 * Writes still in flight, shared by a logger and every child derived from it
 * so that `flush()` on any of them waits for all of them.
 */
type PendingWrites = Set<Promise<void>>;

export type { Logger, LoggerConfig, LogOptions } from "../../types/index.js";

/**
 * Dispatches structured log events to the registered providers.
 */
export class TelemetryLogger implements LoggerInterface {
  private readonly environment: RuntimeEnvironment;
  private readonly providers: TelemetryProvider[];
  private readonly defaultTags: TagRecord | undefined;
  private readonly minLevel: LogLevel;
  private readonly scope: LoggerScope;
  private readonly pending: PendingWrites;

  /**
   * @param config - Environment, providers, default tags and minimum level.
   * @param scope - Tags and context applied to every emitted event.
   */
  constructor(config?: LoggerConfig, scope?: LoggerScope, pending?: PendingWrites) {
    const envCandidate = globalEnv.NODE_ENV;
    this.environment =
      config?.environment ??
      (isEnvironment(envCandidate) ? envCandidate : "development");
    this.providers = config?.providers ?? [];
    this.defaultTags = config?.defaultTags;
    this.minLevel = config?.minLevel ?? "debug";
    this.pending = pending ?? new Set();
    this.scope = {
      ...scope,
      tags: {
        ...this.defaultTags,
        ...scope?.tags,
      },
    };
  }

  debug(message: string, options?: LogOptions): void {
    this.dispatch("debug", message, options);
  }

  info(message: string, options?: LogOptions): void {
    this.dispatch("info", message, options);
  }

  warn(message: string, options?: LogOptions): void {
    this.dispatch("warn", message, options);
  }

  error(message: string, options?: LogOptions): void {
    this.dispatch("error", message, options);
  }

  /**
   * Returns a child logger with additional tags merged into the scope.
   */
  withTags(tags: TagRecord): LoggerInterface {
    return this.child({ tags });
  }

  /**
   * Returns a child logger whose scope is merged on top of this one.
   */
  child(scope: LoggerScope): LoggerInterface {
    const merged: LoggerScope = {
      tags: {
        ...this.scope.tags,
        ...scope.tags,
      },
      context: {
        ...this.scope.context,
        ...scope.context,
      },
    };

    return new TelemetryLogger(
      {
        environment: this.environment,
        providers: this.providers,
        defaultTags: this.defaultTags,
        minLevel: this.minLevel,
      },
      merged,
      this.pending,
    );
  }

  /**
   * Waits for pending provider writes, then flushes providers that buffer.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
    const tasks = this.providers
      .map((provider) => provider.flush?.())
      .filter((task): task is Promise<void> | void => task !== undefined)
      .map((task) => Promise.resolve(task));

    await Promise.all(tasks);
  }

  private dispatch(
    level: LogLevel,
    message: string,
    options: LogOptions = {},
  ): void {
    if (!levelEnabled(level, this.minLevel)) return;

    const context = {
      ...this.scope.context,
      ...options.context,
    };

    const event: LogEvent = {
      level,
      message,
      timestamp: new Date(),
      tags: {
        ...this.scope.tags,
        ...options.tags,
      },
      context: Object.keys(context).length > 0 ? context : undefined,
      error: options.error,
      runtime: {
        environment: this.environment,
      },
    };

    for (const provider of this.providers) {
      try {
        const result = provider.log?.(event);
        if (result instanceof Promise) this.track(provider.name, result);
      } catch (error) {
        diagnosticConsole.error(
          `[telemetry] Provider ${provider.name} failed to log`,
          error,
        );
      }
    }
  }

  private track(providerName: string, task: Promise<void>): void {
    const settled = task.catch((error: unknown) => {
      diagnosticConsole.error(
        `[telemetry] Provider ${providerName} failed to log`,
        error,
      );
    });
    this.pending.add(settled);
    void settled.finally(() => this.pending.delete(settled));
  }
}

/**
 * Sets up each provider with the shared runtime context and returns a logger
 * over all of them.
 */
export function createLogger(
  providers: TelemetryProvider[],
  options: Omit<LoggerConfig, "providers"> & { release?: string } = {},
): TelemetryLogger {
  const envCandidate = globalEnv.NODE_ENV;
  const environment =
    options.environment ??
    (isEnvironment(envCandidate) ? envCandidate : "development");
  for (const provider of providers) {
    try {
      const setupResult = provider.setup?.({ environment, release: options.release });
      if (setupResult instanceof Promise) {
        setupResult.catch((error: unknown) => {
          diagnosticConsole.error(
            `[telemetry] Failed to setup provider ${provider.name}`,
            error,
          );
        });
      }
    } catch (error) {
      diagnosticConsole.error(
        `[telemetry] Failed to setup provider ${provider.name}`,
        error,
      );
    }
  }

  return new TelemetryLogger({
    environment,
    providers,
    defaultTags: options.defaultTags,
    minLevel: options.minLevel,
  });
}
