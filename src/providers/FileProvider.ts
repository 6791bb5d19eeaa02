import type {
  FileProviderOptions,
  LogEvent,
  LogLevel,
  TelemetryProvider,
} from "../types/index.js";
import { levelEnabled } from "../core/logger/Logger.js";
import { formatLogLine } from "../ingest/format.js";
import { formatLogTimestamp } from "../utils/timestamps.js";

export type { FileProviderOptions } from "../types/index.js";

const fallbackError = (...args: unknown[]): void => {
  (globalThis as { console?: { error?: (...values: unknown[]) => void } })
    .console?.error?.(...args);
};

/**
 * Appends `[timestamp] [TYPE] message` lines to one Log Store category.
 * A failed write is reported through `onError` (or `console.error`) and
 * never propagates to the caller.
 */
export class FileProvider implements TelemetryProvider {
  readonly name: string;
  private readonly options: FileProviderOptions;
  private readonly minLevel: LogLevel;

  constructor(options: FileProviderOptions) {
    this.options = options;
    this.name = `file:${options.category}`;
    this.minLevel = options.minLevel ?? "info";
  }

  log(event: LogEvent): Promise<void> | void {
    if (!levelEnabled(event.level, this.minLevel)) return;

    const message = event.error
      ? `${event.message}: ${event.error.message}`
      : event.message;
    const line = formatLogLine(
      formatLogTimestamp(event.timestamp, this.options.timeZone),
      event.level,
      message,
    );

    return this.options.store
      .append(this.options.category, line)
      .catch((error: unknown) => {
        if (this.options.onError) {
          this.options.onError(error);
          return;
        }
        fallbackError(
          `[telemetry] Could not write to the ${this.options.category} log`,
          error,
        );
      });
  }
}
