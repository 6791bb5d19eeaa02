import type { LogLevel } from "../types/index.js";
import type { ErrorRecord } from "./types.js";

export const SEPARATOR = "-".repeat(80);

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export const levelLabel = (level: LogLevel): string => LEVEL_LABELS[level];

const flag = (value: boolean | undefined): string =>
  value === undefined ? "Unknown" : String(value);

/**
 * Renders one client error as a multi-line entry. Field order and labels are
 * read by external log viewers; keep them stable.
 */
export function formatClientErrorEntry(record: ErrorRecord, ip: string): string {
  const lines = [
    `[${record.timestamp}] [CLIENT ERROR]`,
    `  Source: ${record.source}`,
    `  Context: ${record.context}`,
    `  Message: ${record.message}`,
    `  URL: ${record.pageUrl}`,
    `  User Agent: ${record.userAgent}`,
    `  DNS: ${record.endpointDns}`,
    `  CORS: ${flag(record.corsEnabled)}`,
    `  HTTPS: ${flag(record.httpsEnabled)}`,
  ];

  if (record.stackTrace && record.stackTrace.length > 0) {
    lines.push("  Stack Trace:");
    for (const line of record.stackTrace) lines.push(`    ${line}`);
  }

  lines.push(`  IP: ${ip}`, SEPARATOR);
  return `${lines.join("\n")}\n`;
}

/** Single-line `[timestamp] [TYPE] message` entry for service events. */
export function formatLogLine(
  timestamp: string,
  level: LogLevel,
  message: string,
): string {
  return `[${timestamp}] [${levelLabel(level)}] ${message.replace(/[\r\n]+/g, " ")}\n`;
}
