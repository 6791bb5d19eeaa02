const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

type DatePart = "day" | "month" | "year" | "hour" | "minute" | "second";
type DateParts = Record<DatePart, string>;

const DATE_PARTS = new Set<string>(["day", "month", "year", "hour", "minute", "second"]);

const isDatePart = (type: string): type is DatePart => DATE_PARTS.has(type);

const partsFor = (date: Date, timeZone?: string): DateParts => {
  const formatter = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });

  const parts: DateParts = {
    day: "00",
    month: "00",
    year: "0000",
    hour: "00",
    minute: "00",
    second: "00",
  };
  for (const part of formatter.formatToParts(date)) {
    if (isDatePart(part.type)) parts[part.type] = part.value;
  }
  return parts;
};

/**
 * Formats a date as `dd/MM/yyyy HH:mm:ss`, the shape used for every
 * server-side log line. Uses the system zone unless one is given.
 */
export const formatLogTimestamp = (date: Date, timeZone?: string): string => {
  const { day, month, year, hour, minute, second } = partsFor(date, timeZone);
  return `${day}/${month}/${year} ${hour}:${minute}:${second}`;
};

/** `yyyyMMdd_HHmmss` in UTC, used to name rotated log files. */
export const compactUtcStamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
  `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
