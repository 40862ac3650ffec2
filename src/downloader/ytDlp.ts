/**
 * yt-dlp as the media engine, run as a child process.
 */
import { execa } from "execa";
import { parseRawVideoInfo, type RawVideoInfo } from "./schemas.js";
import { buildProgressTemplate, parseProgressLine } from "./progress.js";
import type {
  EngineDownloadOutcome,
  EngineDownloadRequest,
  EngineProgressEvent,
  MediaEngine,
} from "./types.js";

export const OUTPUT_PATH_PREFIX = "[file] ";

// ============================================================================
// Arguments
// ============================================================================

/**
 * Arguments for a quiet metadata-only run.
 */
export function buildInfoArgs(url: string): string[] {
  return ["--dump-single-json", "--skip-download", "--no-playlist", "--quiet", "--no-warnings", "--", url];
}

/**
 * Arguments for downloading one format. The final file path is printed
 * after post-processing, prefixed so it can be told apart from progress lines.
 */
export function buildDownloadArgs(request: Pick<EngineDownloadRequest, "url" | "formatId" | "outputTemplate">): string[] {
  return [
    "--format",
    request.formatId,
    "--output",
    request.outputTemplate,
    "--no-playlist",
    "--no-warnings",
    "--newline",
    "--progress",
    "--progress-template",
    buildProgressTemplate(),
    "--print",
    `after_move:${OUTPUT_PATH_PREFIX}%(filepath)s`,
    "--no-simulate",
    "--",
    request.url,
  ];
}

// ============================================================================
// Output parsing
// ============================================================================

export type DownloadOutputLine =
  | { kind: "progress"; event: EngineProgressEvent }
  | { kind: "file"; path: string }
  | { kind: "error"; message: string }
  | { kind: "other" };

/**
 * Classifies one line of yt-dlp output during a download.
 */
export function parseDownloadOutputLine(line: string): DownloadOutputLine {
  const event = parseProgressLine(line);
  if (event) return { kind: "progress", event };

  if (line.startsWith(OUTPUT_PATH_PREFIX)) {
    const path = line.slice(OUTPUT_PATH_PREFIX.length).trim();
    return path === "" || path === "NA" ? { kind: "other" } : { kind: "file", path };
  }

  if (line.startsWith("ERROR:")) {
    return { kind: "error", message: line.slice("ERROR:".length).trim() };
  }

  return { kind: "other" };
}

/**
 * Picks the most useful message from a failed run's output.
 */
export function extractErrorMessage(output: string, fallback: string): string {
  const errorLines = output
    .split(/\r?\n/)
    .filter((line) => line.startsWith("ERROR:"))
    .map((line) => line.slice("ERROR:".length).trim());
  return errorLines.at(-1) ?? fallback;
}

// ============================================================================
// Engine
// ============================================================================

/* v8 ignore start */
export class YtDlpEngine implements MediaEngine {
  constructor(private readonly binary: string = "yt-dlp") {}

  /**
   * Version string of the installed binary, or null if it can't be run.
   */
  async version(): Promise<string | null> {
    const result = await execa(this.binary, ["--version"], { reject: false });
    return result.failed ? null : result.stdout.trim();
  }

  async extractInfo(url: string): Promise<RawVideoInfo> {
    const result = await execa(this.binary, buildInfoArgs(url), { reject: false });

    if (result.failed) {
      throw new Error(extractErrorMessage(result.stderr, result.shortMessage));
    }
    return parseRawVideoInfo(result.stdout);
  }

  async download(request: EngineDownloadRequest): Promise<EngineDownloadOutcome> {
    const subprocess = execa(this.binary, buildDownloadArgs(request), {
      all: true,
      reject: false,
    });

    let filePath: string | null = null;
    let lastError: string | null = null;

    for await (const line of subprocess.iterable({ from: "all" })) {
      const parsed = parseDownloadOutputLine(line);
      switch (parsed.kind) {
        case "progress":
          request.onProgress?.(parsed.event);
          break;
        case "file":
          filePath = parsed.path;
          break;
        case "error":
          lastError = parsed.message;
          break;
        case "other":
          break;
      }
    }

    const result = await subprocess;
    if (result.failed) {
      throw new Error(lastError ?? result.shortMessage);
    }
    return { filePath };
  }
}
/* v8 ignore stop */
