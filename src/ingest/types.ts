/**
 * Body the capture agent posts to the ingestion route. Only `message` is
 * required; everything else is filled in server-side when absent.
 */
export interface ErrorRecordPayload {
  message: string;
  // Client-local time as the browser rendered it
  timestamp?: string;
  source?: string;
  context?: string;
  userAgent?: string;
  url?: string;
  // Stream provider the player was pointed at
  dns?: string;
  cors?: boolean;
  https?: boolean;
  // Newline-joined (Error#stack) or already split
  stack?: string | string[];
}

/**
 * A validated record with defaults applied, ready to be sanitized and
 * written. Unknown flags stay `undefined` and render as "Unknown".
 */
export interface ErrorRecord {
  timestamp: string;
  message: string;
  source: string;
  context: string;
  userAgent: string;
  pageUrl: string;
  endpointDns: string;
  corsEnabled?: boolean;
  httpsEnabled?: boolean;
  stackTrace?: string[];
}

export type IngestSuccess = {
  status: "success";
  message: "Error logged successfully";
  timestamp: string;
};

export type IngestFailure = {
  status: "error";
  message: string;
};

export type IngestResponse = IngestSuccess | IngestFailure;

export interface IngestOptions {
  /** Take the caller identity from the last `X-Forwarded-For` hop instead of the socket. */
  trustProxy?: boolean;
  /** Write a WARNING line to the application log for every denial. */
  logRateLimited?: boolean;
  /** IANA zone for the server-side timestamp fallback. */
  timeZone?: string;
  now?: () => Date;
}
