/**
 * First-boot tracking for the pinger's virtual uptime clock.
 *
 * The first start ever writes the current time to the boot file; every later
 * start reads it back so the virtual clock keeps counting across restarts.
 */
import { outputFile, readTextIfExists } from "../shared/fs.js";
import { formatTimestamp, parseTimestamp, truncateToSeconds } from "../shared/time.js";

export interface BootRecord {
  /** Real wall-clock time of the first start, whole seconds */
  startedAt: Date;
  /** False when the record was created by this start */
  restored: boolean;
}

/**
 * Raised when the boot file exists but doesn't hold a valid timestamp.
 * Startup must fail rather than silently reset the clock.
 */
export class BootTimeError extends Error {
  constructor(
    readonly path: string,
    readonly content: string
  ) {
    super(`Malformed boot time in ${path}: "${content}" (expected YYYY-MM-DD HH:MM:SS)`);
    this.name = "BootTimeError";
  }
}

/**
 * Loads the persisted boot time, or records `now` as the boot time on first run.
 */
export async function loadOrCreateBootRecord(
  path: string,
  now: Date = new Date()
): Promise<BootRecord> {
  const existing = await readTextIfExists(path);

  if (existing !== null) {
    const content = existing.trim();
    const startedAt = parseTimestamp(content);
    if (!startedAt) {
      throw new BootTimeError(path, content);
    }
    return { startedAt, restored: true };
  }

  const startedAt = truncateToSeconds(now);
  await outputFile(path, formatTimestamp(startedAt));
  return { startedAt, restored: false };
}

/**
 * Current virtual time: the virtual epoch advanced by the real time elapsed
 * since the first boot.
 */
export function virtualNow(record: BootRecord, virtualEpoch: Date, now: Date = new Date()): Date {
  const elapsedMs = now.getTime() - record.startedAt.getTime();
  return new Date(virtualEpoch.getTime() + elapsedMs);
}
