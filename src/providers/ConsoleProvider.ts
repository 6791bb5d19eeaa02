import type {
  ConsoleProviderOptions,
  LogEvent,
  ProviderContext,
  TelemetryProvider,
} from "../types/index.js";
import { describeEvent, toStructured } from "./utils/renderValue.js";

type ConsoleLike = {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const LEVEL_COLORS: Record<string, string> = {
  debug: "\u001B[38;5;240m",
  info: "\u001B[32m",
  warn: "\u001B[33m",
  error: "\u001B[31m",
};

const RESET = "\u001B[0m";

const resolveConsole = (): ConsoleLike =>
  (globalThis as unknown as { console?: ConsoleLike }).console ??
  ({
    log: () => {},
    warn: () => {},
    error: () => {},
  } satisfies ConsoleLike);

export type { ConsoleProviderOptions } from "../types/index.js";

/**
 * Provider that writes log events to standard output. Used as the plain
 * diagnostic channel when consola is not wanted.
 */
export class ConsoleProvider implements TelemetryProvider {
  name = "console";
  private environment: ProviderContext["environment"] = "development";
  private readonly options: ConsoleProviderOptions;

  constructor(options: ConsoleProviderOptions = {}) {
    this.options = options;
  }

  setup(context: ProviderContext): void {
    this.environment = context.environment;
  }

  /**
   * Production output is one JSON document per line for aggregation;
   * anywhere else it is colourised text.
   */
  log(event: LogEvent): void {
    const output = resolveConsole();

    if (this.options.debug) {
      output.log(`[console] Debug - Log event received:`, {
        message: event.message,
        level: event.level,
        tags: event.tags,
        timestamp: event.timestamp,
      });
    }

    if (this.environment === "production") {
      output.log(JSON.stringify(toStructured(event, this.options.redactKeys)));
      return;
    }

    const color =
      this.options.enableColors === false
        ? ""
        : (LEVEL_COLORS[event.level] ?? "");
    const reset = color ? RESET : "";
    const line = [
      `${color}[${event.level.toUpperCase()}]${reset}`,
      ...describeEvent(event, this.options.enableColors !== false),
    ].join(" | ");

    if (event.level === "error") {
      output.error(line);
    } else if (event.level === "warn") {
      output.warn(line);
    } else {
      output.log(line);
    }
  }
}
