import { appendLines, readTextIfExists } from "../shared/fs.js";
import { formatTimestamp } from "../shared/time.js";

export const DEFAULT_RECENT_LINES = 100;

/**
 * Outcome of one line-producing event in a visit cycle.
 */
export type VisitOutcome =
  | { kind: "visited"; url: string }
  | { kind: "failed"; url: string; message: string }
  | { kind: "missingList"; fileName: string };

/**
 * Formats one log line, e.g. `[2025-06-13 08:00:00] ✅ https://example.com → 200`.
 */
export function formatLogLine(at: Date, outcome: VisitOutcome): string {
  const prefix = `[${formatTimestamp(at)}]`;
  switch (outcome.kind) {
    case "visited":
      return `${prefix} ✅ ${outcome.url} → 200`;
    case "failed":
      return `${prefix} ❌ ${outcome.url} → Error: ${singleLine(outcome.message)}`;
    case "missingList":
      return `${prefix} ❌ ${outcome.fileName} not found.`;
  }
}

/**
 * Browser errors often span several lines (call logs); the log is line-based.
 */
function singleLine(message: string): string {
  return message.replace(/\s*\r?\n\s*/g, " ").trim();
}

/**
 * Appends a cycle's lines to the log file in one write.
 */
export async function appendLogLines(path: string, lines: readonly string[]): Promise<void> {
  await appendLines(path, lines);
}

/**
 * Returns the last `limit` non-empty lines of the log, oldest first.
 * A missing log reads as empty.
 */
export async function readRecentLogLines(
  path: string,
  limit: number = DEFAULT_RECENT_LINES
): Promise<string[]> {
  const content = await readTextIfExists(path);
  if (content === null) return [];

  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== "");
  return lines.slice(-limit);
}
