import { createConsola, type ConsolaInstance } from "consola";
import type {
  ConsolaProviderOptions,
  LogEvent,
  ProviderContext,
  TelemetryProvider,
} from "../types/index.js";
import { describeEvent, toStructured } from "./utils/renderValue.js";

export type { ConsolaProviderOptions } from "../types/index.js";

/**
 * Provider that emits events through a tagged consola instance.
 */
export class ConsolaProvider implements TelemetryProvider {
  name = "consola";
  private environment: ProviderContext["environment"] = "development";
  private readonly options: ConsolaProviderOptions;
  private readonly logger: ConsolaInstance;

  constructor(options: ConsolaProviderOptions = {}, instance?: ConsolaInstance) {
    this.options = options;
    const base =
      instance ??
      createConsola({
        ...(typeof options.level === "number" ? { level: options.level } : {}),
        ...(typeof options.fancy === "boolean" ? { fancy: options.fancy } : {}),
      });
    this.logger = options.tag ? base.withTag(options.tag) : base;
  }

  setup(context: ProviderContext): void {
    this.environment = context.environment;
  }

  log(event: LogEvent): void {
    if (this.options.debug) {
      this.logger.debug(`[consola] Debug - Log event received:`, {
        message: event.message,
        level: event.level,
        tags: event.tags,
        timestamp: event.timestamp,
      });
    }

    if (this.environment === "production") {
      this.logWithLevel(event.level, JSON.stringify(toStructured(event)));
      return;
    }

    this.logWithLevel(event.level, describeEvent(event, true).join(" | "));
  }

  private logWithLevel(level: LogEvent["level"], message: string): void {
    switch (level) {
      case "debug": {
        this.logger.debug(message);
        break;
      }
      case "info": {
        this.logger.info(message);
        break;
      }
      case "warn": {
        this.logger.warn(message);
        break;
      }
      case "error": {
        this.logger.error(message);
        break;
      }
    }
  }
}
