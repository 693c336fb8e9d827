/**
 * Date utilities for front matter and feeds
 */

const MONTHS_SHORT = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/**
 * Coerce a front matter value into a Date
 * YAML timestamps arrive as Date, quoted ones as strings
 */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

/**
 * Format a Date as YYYY-MM-DD string (ISO date without time)
 *
 * @example
 * toISODateString(new Date("2025-01-15T10:30:00Z")) // "2025-01-15"
 */
export function toISODateString(date: Date): string {
  const isoString = date.toISOString();
  return isoString.substring(0, isoString.indexOf("T"));
}

/**
 * "15 Jan 2025", in UTC
 */
export function toShortDateString(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, "0");
  const month = MONTHS_SHORT[date.getUTCMonth()] ?? "";
  return `${day} ${month} ${date.getUTCFullYear()}`;
}

/**
 * Format date to RFC 822 format (required by RSS 2.0)
 * Example: "Mon, 01 Jan 2024 10:00:00 GMT"
 */
export function toRFC822Date(date: Date): string {
  return date.toUTCString();
}

/**
 * Day of the year, 1-based, in UTC
 */
export function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.floor((date.getTime() - start) / 86_400_000) + 1;
}
