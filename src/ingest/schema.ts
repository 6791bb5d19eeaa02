import type { ErrorRecord } from "./types.js";
import { formatLogTimestamp } from "../utils/timestamps.js";

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Objects and arrays are kept as their JSON text; only null and undefined are absent.
const asText = (value: unknown): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // circular structures fall through to String()
  }
  return String(value);
};

const textOr = (value: unknown, fallback: string): string => {
  const text = asText(value);
  return text === undefined || text === "" ? fallback : text;
};

// Browsers send real booleans; older agents and form posts send "true"/"1".
const asFlag = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0" || normalized === "") {
      return false;
    }
  }
  return undefined;
};

const asStackLines = (value: unknown): string[] | undefined => {
  let lines: string[];
  if (typeof value === "string") {
    lines = value.split(/\r?\n/);
  } else if (Array.isArray(value)) {
    lines = value.flatMap((line) => {
      const text = asText(line);
      return text === undefined ? [] : text.split(/\r?\n/);
    });
  } else {
    return undefined;
  }

  const trimmed = lines.map((line) => line.trim()).filter(Boolean);
  return trimmed.length > 0 ? trimmed : undefined;
};

/**
 * Parses a raw request body into an {@link ErrorRecord}, applying the
 * server-side defaults.
 * @throws {ValidationError} When the body is not a JSON object or carries no message.
 */
export function parseErrorRecord(
  body: string | undefined,
  options: { now?: () => Date; timeZone?: string } = {},
): ErrorRecord {
  let input: unknown;
  try {
    input = JSON.parse(body ?? "");
  } catch {
    throw new ValidationError("Invalid data format");
  }

  return validateErrorRecord(input, options);
}

/**
 * @throws {ValidationError} When `input` is not an object or `message` is absent or blank.
 */
export function validateErrorRecord(
  input: unknown,
  options: { now?: () => Date; timeZone?: string } = {},
): ErrorRecord {
  if (!isObject(input)) throw new ValidationError("Invalid data format");

  const message = asText(input.message);
  if (message === undefined || message.trim() === "") {
    throw new ValidationError("Missing required field: message");
  }

  const now = options.now?.() ?? new Date();

  return {
    timestamp: textOr(input.timestamp, formatLogTimestamp(now, options.timeZone)),
    message,
    source: textOr(input.source, "Unknown"),
    context: textOr(input.context, "General"),
    userAgent: textOr(input.userAgent, "Unknown"),
    pageUrl: textOr(input.url, "Unknown"),
    endpointDns: textOr(input.dns, "Unknown"),
    corsEnabled: asFlag(input.cors),
    httpsEnabled: asFlag(input.https),
    stackTrace: asStackLines(input.stack),
  };
}
