import { homedir } from "node:os";
import { join, resolve } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Persisted settings live in ~/.wakefetch/.
 */
export const APP_DIR = join(homedir(), ".wakefetch");

/**
 * Files the pinger reads and writes inside its data directory.
 */
export interface PingerPaths {
  /** Newline-delimited list of URLs to visit */
  weblistFile: string;
  /** First-run timestamp */
  bootTimeFile: string;
  /** Append-only visit log */
  logFile: string;
}

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}

/**
 * Get the pinger's file paths for a data directory.
 */
export function getPingerPaths(dataDir: string): PingerPaths {
  const root = resolve(expandPath(dataDir));
  return {
    weblistFile: join(root, "weblist.txt"),
    bootTimeFile: join(root, "boot_time.txt"),
    logFile: join(root, "logs.txt"),
  };
}
