export * from "./reporter.js";
export * from "./config-check.js";
export type { ErrorRecordPayload } from "../ingest/types.js";
