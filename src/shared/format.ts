/**
 * Human-readable formatting for durations, sizes and counts shown in the UI.
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB"] as const;

/**
 * Converts seconds to `MM:SS`, or `HH:MM:SS` once the duration reaches an hour.
 * Zero, negative and non-finite durations are reported as "Unknown".
 *
 * @example
 * formatDuration(65)   // => "01:05"
 * formatDuration(3661) // => "01:01:01"
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return "Unknown";
  }

  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const pad = (n: number): string => String(n).padStart(2, "0");
  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}

/**
 * Converts a byte count to a size with one decimal, stepping by 1024.
 *
 * @example
 * formatFileSize(1536) // => "1.5 KB"
 */
export function formatFileSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "Unknown";
  }

  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

/**
 * Formats a view count with thousands separators.
 */
export function formatViewCount(count: number): string {
  return Math.max(0, Math.floor(count)).toLocaleString("en-US");
}

/**
 * Converts the engine's `YYYYMMDD` upload date to `YYYY-MM-DD`.
 * Anything else is returned unchanged, and an empty date as "Unknown".
 */
export function formatUploadDate(date: string): string {
  if (!date) return "Unknown";
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(date);
  if (!match) return date;
  const [, year, month, day] = match;
  return `${year}-${month}-${day}`;
}
