import type { RawVideoInfo } from "./schemas.js";
import type { FetchResult, MediaEngine, VideoInfo } from "./types.js";

/**
 * Applies the display defaults for fields the engine left out.
 */
export function toVideoInfo(raw: RawVideoInfo): VideoInfo {
  return {
    title: raw.title ?? "Unknown Title",
    duration: raw.duration ?? 0,
    thumbnail: raw.thumbnail ?? "",
    uploader: raw.uploader ?? "Unknown",
    viewCount: raw.view_count ?? 0,
    uploadDate: raw.upload_date ?? "",
    description: raw.description ?? "",
    formats: raw.formats ?? [],
  };
}

/**
 * Fetches video metadata through the engine. Never throws; failures come
 * back as an error message for the UI.
 */
export async function fetchVideoInfo(url: string, engine: MediaEngine): Promise<FetchResult> {
  try {
    const raw = await engine.extractInfo(url);
    return { success: true, info: toVideoInfo(raw) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      error: `Error extracting video info: ${message}`,
      errorCode: "FETCH_FAILED",
    };
  }
}
