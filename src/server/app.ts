import {
  createApp,
  createRouter,
  defineEventHandler,
  setResponseHeader,
  setResponseStatus,
  type App,
} from "h3";
import { createIngestHandler } from "../ingest/handler.js";
import type { IngestFailure } from "../ingest/types.js";
import type { TelemetryServices } from "./services.js";

/**
 * Route answered while error logging is switched off, so agents get a
 * definite answer instead of a 404.
 */
const disabledHandler = defineEventHandler((event): IngestFailure => {
  setResponseHeader(event, "content-type", "application/json");
  setResponseStatus(event, 503);
  return { status: "error", message: "Error logging is disabled" };
});

/**
 * Builds the h3 application serving the ingestion route at `config.path`.
 */
export function createTelemetryApp(services: TelemetryServices): App {
  const { config } = services;
  const app = createApp({
    onError: (error) => {
      // unknown routes and bad methods are not service faults
      if (error.statusCode < 500) return;
      services.loggers.runtime.error("Unhandled request error", { error });
    },
  });
  const router = createRouter();

  const handler = config.enabled
    ? createIngestHandler(
        {
          store: services.store,
          limiter: services.limiter,
          applicationLogger: services.loggers.application,
          runtimeLogger: services.loggers.runtime,
        },
        {
          trustProxy: config.trustProxy,
          logRateLimited: config.rateLimit.logDenials,
          timeZone: config.timeZone,
        },
      )
    : disabledHandler;

  router.use(config.path, handler);
  app.use(router);
  return app;
}
