/**
 * Local wall-clock timestamps in the fixed `YYYY-MM-DD HH:MM:SS` format
 * used by the pinger's boot record and activity log.
 */

export const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time.
 *
 * @example
 * formatTimestamp(new Date(2025, 5, 13, 8, 4, 9))
 * // => "2025-06-13 08:04:09"
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parses a local `YYYY-MM-DD HH:MM:SS` timestamp.
 * Returns null when the text doesn't match the format or names an impossible date.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;

  const [, year = "0", month = "0", day = "0", hours = "0", minutes = "0", seconds = "0"] = match;
  const date = new Date(
    parseInt(year, 10),
    parseInt(month, 10) - 1,
    parseInt(day, 10),
    parseInt(hours, 10),
    parseInt(minutes, 10),
    parseInt(seconds, 10)
  );

  // Date rolls over out-of-range fields (e.g. month 13); reject those
  if (formatTimestamp(date) !== text) return null;
  return date;
}

/**
 * Drops the milliseconds so the value survives a format/parse round trip.
 */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}
