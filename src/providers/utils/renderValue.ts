import type { LogEvent } from "../../types/index.js";

const JSON_INDENT = 2;

/**
 * Renders arbitrary values for human-readable output. Strings are returned
 * as they are; anything else is JSON, indented when `pretty` is set.
 */
export const renderValue = (value: unknown, pretty: boolean): string => {
  if (typeof value === "string") return value;

  try {
    const serialized = JSON.stringify(value, null, pretty ? JSON_INDENT : 0);
    if (serialized) return serialized;
  } catch {
    // circular or BigInt values fall back to String()
  }

  return String(value);
};

/**
 * Builds the ` | `-joined segments shared by the text providers, without the
 * level prefix.
 */
export const describeEvent = (event: LogEvent, pretty: boolean): string[] => {
  const parts: string[] = [event.message];

  if (event.tags && Object.keys(event.tags).length > 0) {
    parts.push(`tags=${renderValue(event.tags, pretty)}`);
  }

  if (event.error) {
    parts.push(`error=${event.error.stack ?? event.error.message}`);
  }

  if (event.context && Object.keys(event.context).length > 0) {
    parts.push(`ctx=${renderValue(event.context, pretty)}`);
  }

  return parts;
};

/**
 * Structured form of an event for JSON output, with the listed top-level
 * keys replaced by `[REDACTED]`.
 */
export const toStructured = (
  event: LogEvent,
  redactKeys: readonly string[] = [],
): Record<string, unknown> => {
  const payload: Record<string, unknown> = {
    level: event.level,
    message: event.message,
    timestamp: event.timestamp.toISOString(),
    tags: event.tags,
    context: event.context,
    error: event.error
      ? { name: event.error.name, message: event.error.message, stack: event.error.stack }
      : undefined,
    runtime: event.runtime,
  };

  for (const key of redactKeys) {
    if (key in payload && payload[key] !== undefined) payload[key] = "[REDACTED]";
  }

  return payload;
};
