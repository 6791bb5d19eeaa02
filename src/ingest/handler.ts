import {
  defineEventHandler,
  getRequestHeader,
  getRequestIP,
  readRawBody,
  sendNoContent,
  setResponseHeaders,
  setResponseStatus,
  type H3Event,
} from "h3";
import type { FixedWindowLimiter } from "./rate-limit.js";
import type { LogStore } from "../store/LogStore.js";
import type { Logger } from "../types/index.js";
import type { IngestFailure, IngestOptions, IngestResponse } from "./types.js";
import { ValidationError, parseErrorRecord } from "./schema.js";
import { sanitizeRecord, sanitizeText } from "./sanitize.js";
import { formatClientErrorEntry } from "./format.js";

export interface IngestDependencies {
  store: LogStore;
  limiter: FixedWindowLimiter;
  /** Application-category logger; receives rate-limit denials when enabled. */
  applicationLogger: Logger;
  /** Runtime-category logger; receives failures that happen while logging. */
  runtimeLogger: Logger;
}

export const UNKNOWN_IDENTITY = "unknown";

const RESPONSE_HEADERS = {
  "content-type": "application/json",
  "access-control-allow-origin": "*",
  "access-control-allow-methods": "POST",
  "access-control-allow-headers": "Content-Type",
};

/**
 * Caller identity for rate limiting: the peer address, or, behind a trusted
 * proxy, the last `X-Forwarded-For` hop. Earlier hops are whatever the client
 * sent and are never used.
 */
export function resolveIdentity(event: H3Event, trustProxy = false): string {
  if (trustProxy) {
    const hops = (getRequestHeader(event, "x-forwarded-for") ?? "")
      .split(",")
      .map((hop) => hop.trim())
      .filter(Boolean);
    const proxied = hops.at(-1);
    if (proxied) return proxied;
  }
  try {
    return getRequestIP(event) || UNKNOWN_IDENTITY;
  } catch {
    return UNKNOWN_IDENTITY;
  }
}

const fail = (event: H3Event, status: number, message: string): IngestFailure => {
  setResponseStatus(event, status);
  return { status: "error", message };
};

export const STORAGE_FAILURE_REASON = "Storage unavailable";

// Only validation messages reach the caller.
const publicReason = (error: unknown): string =>
  error instanceof ValidationError ? error.message : STORAGE_FAILURE_REASON;

const asError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Builds the ingestion route: rate limit, rotate if due, parse, sanitize,
 * append, then acknowledge. Every outcome is one of the JSON bodies below; the handler
 * itself never throws.
 *
 * Once the body has been read the write runs to completion even if the
 * caller has gone away.
 */
export function createIngestHandler(
  deps: IngestDependencies,
  options: IngestOptions = {},
) {
  return defineEventHandler(async (event): Promise<IngestResponse | void> => {
    setResponseHeaders(event, RESPONSE_HEADERS);

    if (event.method === "OPTIONS") {
      sendNoContent(event, 200);
      return;
    }

    if (event.method !== "POST") {
      return fail(event, 405, "Method not allowed");
    }

    const identity = resolveIdentity(event, options.trustProxy);
    if (!deps.limiter.admit(identity)) {
      if (options.logRateLimited) {
        deps.applicationLogger.warn(`Rate limit exceeded for IP: ${sanitizeText(identity)}`);
      }
      return fail(event, 429, "Rate limit exceeded");
    }

    try {
      await deps.store.rotateIfOversize("application");

      const body = await readRawBody(event, "utf8");
      const record = sanitizeRecord(
        parseErrorRecord(body, { now: options.now, timeZone: options.timeZone }),
      );

      await deps.store.append(
        "application",
        formatClientErrorEntry(record, sanitizeText(identity)),
      );

      setResponseStatus(event, 200);
      return {
        status: "success",
        message: "Error logged successfully",
        timestamp: record.timestamp,
      };
    } catch (error) {
      deps.runtimeLogger.error("Failed to log client error", {
        error: asError(error),
        context: { identity },
      });
      return fail(event, 500, `Failed to log error: ${publicReason(error)}`);
    }
  });
}
