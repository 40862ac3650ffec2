import { access, appendFile, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Check if a file or directory exists.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Write a file, creating parent directories if needed.
 */
export async function outputFile(path: string, data: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, data, "utf-8");
}

/**
 * Read a UTF-8 file, or null if it doesn't exist.
 * Other read errors (permissions, directories) are rethrown.
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

/**
 * Append lines to a file in a single write, each terminated by a newline.
 */
export async function appendLines(path: string, lines: readonly string[]): Promise<void> {
  if (lines.length === 0) return;
  await ensureDir(dirname(path));
  await appendFile(path, lines.map((line) => `${line}\n`).join(""), "utf-8");
}

/**
 * Create a fresh directory under the OS temp dir.
 */
export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory tree; missing paths are not an error.
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * True for the ENOENT error raised by fs calls on missing paths.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// Re-exported for callers that read binary files
export { readFile } from "node:fs/promises";
