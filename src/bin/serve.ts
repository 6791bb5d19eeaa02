#!/usr/bin/env node
import "dotenv/config";
import { createServer } from "node:http";
import { toNodeListener } from "h3";
import { ConfigError, resolveConfig } from "../config/config.js";
import { createTelemetryApp } from "../server/app.js";
import { createServices } from "../server/services.js";

function loadConfig() {
  try {
    return resolveConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[telemetry] Invalid configuration: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfig();
const services = createServices(config);
const logger = services.loggers.application;

logger.info("telemetry service loaded", {
  context: {
    path: config.path,
    logDirectory: config.logDirectory,
    enabled: config.enabled,
  },
});

const server = createServer(toNodeListener(createTelemetryApp(services)));

server.listen(config.port, config.host, () => {
  logger.debug(`Listening on http://${config.host}:${config.port}${config.path}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.debug(`Received ${signal}, closing`);
  server.close((error) => {
    void services
      .flush()
      .catch((flushError: unknown) => {
        console.error("[telemetry] Failed to flush logs", flushError);
      })
      .finally(() => process.exit(error ? 1 : 0));
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
