import type { ErrorRecord } from "./types.js";

// A `<` only opens a tag when a name, `/`, `!` or `?` follows it, so "a < b" survives.
// An unterminated tag swallows the rest of the value.
const TAG_PATTERN = /<[!/?a-z][^>]*(?:>|$)/gi;
const LINE_BREAKS = /[\r\n]+/g;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "'": "&#039;",
};

export const stripTags = (value: string): string => value.replace(TAG_PATTERN, "");

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

/**
 * Removes markup from a single string and escapes what is left. Line breaks
 * collapse to a space so one value can never open a new log line.
 */
export const sanitizeText = (value: string): string =>
  escapeHtml(stripTags(value)).replace(LINE_BREAKS, " ");

/**
 * Returns a copy of `record` with every string field and every stack line
 * sanitized. Boolean flags are left as they are.
 */
export function sanitizeRecord(record: ErrorRecord): ErrorRecord {
  return {
    ...record,
    timestamp: sanitizeText(record.timestamp),
    message: sanitizeText(record.message),
    source: sanitizeText(record.source),
    context: sanitizeText(record.context),
    userAgent: sanitizeText(record.userAgent),
    pageUrl: sanitizeText(record.pageUrl),
    endpointDns: sanitizeText(record.endpointDns),
    stackTrace: record.stackTrace?.map((line) => sanitizeText(line)),
  };
}
