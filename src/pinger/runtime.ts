import type { Config } from "../config/schema.js";
import { getPingerPaths, type PingerPaths } from "../config/paths.js";
import { parseTimestamp } from "../shared/time.js";
import { type BootRecord, loadOrCreateBootRecord } from "./bootTime.js";

/**
 * Process-lifetime settings shared by the visit loop and the status page.
 * Built once at startup and passed to whatever needs it.
 */
export interface PingerRuntime {
  paths: PingerPaths;
  bootRecord: BootRecord;
  virtualEpoch: Date;
  intervalMs: number;
  /** Navigation timeout per visit; 0 waits indefinitely */
  visitTimeoutMs: number;
  recentLines: number;
}

/**
 * Resolves file locations and loads (or creates) the boot record.
 * Throws BootTimeError when the boot file is malformed.
 */
export async function createPingerRuntime(
  config: Config,
  now: Date = new Date()
): Promise<PingerRuntime> {
  const paths = getPingerPaths(config.dataDir);
  const virtualEpoch = parseTimestamp(config.virtualEpoch);
  if (!virtualEpoch) {
    throw new Error(`Invalid virtual epoch: ${config.virtualEpoch}`);
  }

  const bootRecord = await loadOrCreateBootRecord(paths.bootTimeFile, now);

  return {
    paths,
    bootRecord,
    virtualEpoch,
    intervalMs: config.visitIntervalSeconds * 1000,
    visitTimeoutMs: config.visitTimeoutSeconds * 1000,
    recentLines: config.logLines,
  };
}
