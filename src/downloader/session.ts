/**
 * Per-browser-session state of the download UI.
 */
import { getAvailableFormats } from "./formats.js";
import { fetchVideoInfo } from "./videoInfo.js";
import { isValidYoutubeUrl } from "./youtubeUrl.js";
import type { DownloadProgress, FormatRecord, MediaEngine, VideoInfo } from "./types.js";

export const INVALID_URL_MESSAGE = "Please enter a valid YouTube URL";

const DEFAULT_IDLE_TIMEOUT_MS = 60 * 60 * 1000;

/**
 * A finished download held in memory until the user saves it.
 */
export interface ReadyFile {
  fileName: string;
  data: Buffer;
}

export interface DownloadSession {
  /** URL the current video info was fetched from */
  url: string;
  videoInfo: VideoInfo | null;
  formats: FormatRecord[];
  inProgress: boolean;
  progress: DownloadProgress;
  error: string | null;
  readyFile: ReadyFile | null;
}

export function createDownloadSession(): DownloadSession {
  return {
    url: "",
    videoInfo: null,
    formats: [],
    inProgress: false,
    progress: { percent: 0, message: "" },
    error: null,
    readyFile: null,
  };
}

// ============================================================================
// Registry
// ============================================================================

interface RegistryEntry {
  session: DownloadSession;
  lastSeen: number;
}

export interface SessionRegistryOptions {
  /** Sessions unused for this long are dropped, unless a download is running */
  idleTimeoutMs?: number | undefined;
  now?: (() => number) | undefined;
}

/**
 * Download sessions keyed by the HTTP session id.
 */
export class SessionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  readonly idleTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the session for `id`, creating it on first use.
   */
  get(id: string): DownloadSession {
    const now = this.now();
    this.evictIdle(now);

    const existing = this.entries.get(id);
    if (existing) {
      existing.lastSeen = now;
      return existing.session;
    }

    const session = createDownloadSession();
    this.entries.set(id, { session, lastSeen: now });
    return session;
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  private evictIdle(now: number): void {
    for (const [id, entry] of this.entries) {
      if (!entry.session.inProgress && now - entry.lastSeen > this.idleTimeoutMs) {
        this.entries.delete(id);
      }
    }
  }
}

// ============================================================================
// Actions
// ============================================================================

/**
 * Validates the URL and fetches its metadata into the session.
 * On success the format list is replaced and any earlier error or finished
 * download is cleared.
 *
 * @returns Whether video info was loaded.
 */
export async function loadVideo(
  session: DownloadSession,
  url: string,
  engine: MediaEngine
): Promise<boolean> {
  // The running download owns the session until it finishes
  if (session.inProgress) return false;

  const trimmed = url.trim();
  if (!isValidYoutubeUrl(trimmed)) {
    session.error = INVALID_URL_MESSAGE;
    return false;
  }

  const result = await fetchVideoInfo(trimmed, engine);
  if (!result.success || !result.info) {
    session.error = result.error ?? "Could not fetch video info";
    return false;
  }

  session.url = trimmed;
  session.videoInfo = result.info;
  session.formats = getAvailableFormats(result.info);
  session.error = null;
  session.readyFile = null;
  session.progress = { percent: 0, message: "" };
  return true;
}
