/**
 * Shared types for the video download front-end.
 */
import type { RawFormat, RawVideoInfo } from "./schemas.js";

// ============================================================================
// Result Types
// ============================================================================

/**
 * Error codes reported by the downloader layer.
 */
export type DownloadErrorCode =
  | "FETCH_FAILED"
  | "DOWNLOAD_FAILED"
  | "FILE_NOT_FOUND";

/**
 * Result of a download. `outputPath` is the exact file the engine wrote.
 */
export interface DownloadResult {
  success: boolean;
  error?: string | undefined;
  errorCode?: DownloadErrorCode | undefined;
  outputPath?: string | undefined;
}

/**
 * Result of fetching video metadata.
 */
export interface FetchResult {
  success: boolean;
  info?: VideoInfo | undefined;
  error?: string | undefined;
  errorCode?: DownloadErrorCode | undefined;
}

// ============================================================================
// Progress Types
// ============================================================================

export type EngineProgressStatus = "downloading" | "finished" | "error";

/**
 * Progress update in the engine's shape: byte counts and a preformatted
 * percentage, any of which may be unknown.
 */
export interface EngineProgressEvent {
  status: EngineProgressStatus;
  downloadedBytes?: number | undefined;
  totalBytes?: number | undefined;
  /** e.g. " 42.3%" */
  percentStr?: string | undefined;
}

/**
 * Progress as shown to the user.
 */
export interface DownloadProgress {
  /** Progress percentage (0-100) */
  percent: number;
  /** Status text shown under the progress bar */
  message: string;
}

/**
 * Progress listener function type.
 */
export type ProgressCallback = (progress: DownloadProgress) => void;

// ============================================================================
// Video Info Types
// ============================================================================

/**
 * Video metadata with defaults applied for missing fields.
 */
export interface VideoInfo {
  title: string;
  /** Duration in seconds, 0 if unknown */
  duration: number;
  thumbnail: string;
  uploader: string;
  viewCount: number;
  /** YYYYMMDD, empty if unknown */
  uploadDate: string;
  description: string;
  formats: RawFormat[];
}

// ============================================================================
// Format Types
// ============================================================================

interface BaseFormatRecord {
  formatId: string;
  ext: string;
  /** Height in pixels (video) or average bitrate in kbps (audio) */
  quality: number | "Unknown";
  /** Size in bytes, 0 if unknown */
  filesize: number;
  note: string;
}

export interface VideoFormatRecord extends BaseFormatRecord {
  type: "video";
  fps: number;
}

export interface AudioFormatRecord extends BaseFormatRecord {
  type: "audio";
  abr: number;
}

/**
 * A downloadable stream offered to the user.
 */
export type FormatRecord = VideoFormatRecord | AudioFormatRecord;

// ============================================================================
// Engine
// ============================================================================

export interface EngineDownloadRequest {
  url: string;
  formatId: string;
  /** Output template, e.g. `/tmp/dir/%(title)s.%(ext)s` */
  outputTemplate: string;
  onProgress?: ((event: EngineProgressEvent) => void) | undefined;
}

export interface EngineDownloadOutcome {
  /** Final path the engine reported, or null if it reported none */
  filePath: string | null;
}

/**
 * The media extraction and download engine.
 */
export interface MediaEngine {
  /** Fetches metadata without downloading. Rejects on failure. */
  extractInfo: (url: string) => Promise<RawVideoInfo>;
  /** Downloads one format. Rejects on failure. */
  download: (request: EngineDownloadRequest) => Promise<EngineDownloadOutcome>;
}
