/**
 * Progress reporting between the download engine and the UI.
 *
 * The engine publishes events in its own shape (byte counts, a preformatted
 * percentage); subscribers receive a percentage and a status message.
 */
import { formatFileSize } from "../shared/format.js";
import type {
  DownloadProgress,
  EngineProgressEvent,
  EngineProgressStatus,
  ProgressCallback,
} from "./types.js";

export const PROGRESS_LINE_PREFIX = "[progress]";

const ENGINE_STATUSES: readonly EngineProgressStatus[] = ["downloading", "finished", "error"];

function isEngineStatus(value: string): value is EngineProgressStatus {
  return ENGINE_STATUSES.some((status) => status === value);
}

/**
 * Typed channel turning engine progress events into UI progress.
 * State is per download; call reset() before reusing a channel.
 */
export class ProgressChannel {
  private readonly listeners = new Set<ProgressCallback>();
  private percent = 0;

  /** Last percentage sent to subscribers (0-100) */
  get lastPercent(): number {
    return this.percent;
  }

  /**
   * Registers a listener.
   * @returns A function that removes the listener.
   */
  subscribe(listener: ProgressCallback): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reset(): void {
    this.percent = 0;
  }

  /**
   * Handles one engine event. `error` events are ignored; the engine call
   * itself rejects in that case.
   */
  publish(event: EngineProgressEvent): void {
    switch (event.status) {
      case "downloading":
        this.onDownloading(event);
        break;
      case "finished":
        this.emit(100, "Download completed!");
        break;
      case "error":
        break;
    }
  }

  private onDownloading(event: EngineProgressEvent): void {
    const { downloadedBytes, totalBytes, percentStr } = event;

    if (downloadedBytes !== undefined && totalBytes !== undefined && totalBytes > 0) {
      const percent = (downloadedBytes / totalBytes) * 100;
      this.emit(
        percent,
        `Downloaded: ${formatFileSize(downloadedBytes)} / ${formatFileSize(totalBytes)} (${percent.toFixed(1)}%)`
      );
      return;
    }

    if (percentStr !== undefined) {
      const percent = parsePercent(percentStr);
      if (percent === null) {
        this.emit(this.percent, "Downloading...");
      } else {
        this.emit(percent, `Progress: ${percent.toFixed(1)}%`);
      }
    }
  }

  private emit(percent: number, message: string): void {
    this.percent = Math.min(100, Math.max(0, percent));
    const progress: DownloadProgress = { percent: this.percent, message };
    for (const listener of this.listeners) {
      listener(progress);
    }
  }
}

/**
 * Parses a percentage like " 42.3%" (terminal colour codes allowed).
 * Returns null when no number can be read.
 */
export function parsePercent(text: string): number | null {
  const cleaned = text.replace(/\u001b\[[0-9;]*m/g, "").trim().replace(/%+$/, "").trim();
  if (cleaned === "") return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function parseByteCount(token: string | undefined): number | undefined {
  if (token === undefined || token === "NA") return undefined;
  const value = Number(token);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Builds the `--progress-template` that makes yt-dlp print one
 * machine-readable line per update.
 */
export function buildProgressTemplate(): string {
  return (
    `download:${PROGRESS_LINE_PREFIX} %(progress.status)s ` +
    "%(progress.downloaded_bytes)s %(progress.total_bytes)s %(progress._percent_str)s"
  );
}

/**
 * Parses a line printed through the progress template.
 * Returns null for any other output line.
 *
 * @example
 * parseProgressLine("[progress] downloading 50 200  25.0%")
 * // => { status: "downloading", downloadedBytes: 50, totalBytes: 200, percentStr: "25.0%" }
 */
export function parseProgressLine(line: string): EngineProgressEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(PROGRESS_LINE_PREFIX)) return null;

  const [status, downloaded, total, ...rest] = trimmed
    .slice(PROGRESS_LINE_PREFIX.length)
    .trim()
    .split(/\s+/);
  if (status === undefined || !isEngineStatus(status)) return null;

  const percentStr = rest.join(" ");
  return {
    status,
    downloadedBytes: parseByteCount(downloaded),
    totalBytes: parseByteCount(total),
    percentStr: percentStr === "" || percentStr === "NA" ? undefined : percentStr,
  };
}
