export * from "./types/index.js";
export * from "./core/logger/Logger.js";
export * from "./providers/ConsoleProvider.js";
export * from "./providers/ConsolaProvider.js";
export * from "./providers/FileProvider.js";

export * from "./store/LogStore.js";

export * from "./ingest/types.js";
export * from "./ingest/schema.js";
export * from "./ingest/sanitize.js";
export * from "./ingest/rate-limit.js";
export * from "./ingest/format.js";
export * from "./ingest/handler.js";

export * from "./config/config.js";
export * from "./server/services.js";
export * from "./server/app.js";
