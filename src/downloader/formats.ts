/**
 * Turns the engine's raw format list into the streams offered for download.
 */
import { formatFileSize } from "../shared/format.js";
import type { RawFormat } from "./schemas.js";
import type { FormatRecord, VideoInfo } from "./types.js";

export const VIDEO_EXTENSIONS: readonly string[] = ["mp4", "webm", "mkv"];
export const AUDIO_EXTENSIONS: readonly string[] = ["mp3", "m4a", "webm"];

/**
 * A stream is absent only when yt-dlp reports its codec as "none";
 * an unreported codec counts as present.
 */
function hasCodec(codec: string | null | undefined): boolean {
  return codec !== "none";
}

/**
 * Maps one raw format to a record, or null when it isn't offered:
 * - video: neither codec is "none" and a video container extension
 * - audio: video codec exactly "none", audio codec present and an audio
 *   container extension
 */
export function toFormatRecord(format: RawFormat): FormatRecord | null {
  const hasVideo = hasCodec(format.vcodec);
  const hasAudio = hasCodec(format.acodec);
  const ext = format.ext ?? "";
  const formatId = format.format_id ?? "";
  const filesize = format.filesize ?? 0;
  const note = format.format_note ?? "";

  if (hasVideo && hasAudio && VIDEO_EXTENSIONS.includes(ext)) {
    return {
      formatId,
      ext,
      quality: format.height ?? "Unknown",
      filesize,
      type: "video",
      note,
      fps: format.fps ?? 0,
    };
  }

  if (format.vcodec === "none" && hasAudio && AUDIO_EXTENSIONS.includes(ext)) {
    return {
      formatId,
      ext,
      quality: format.abr ?? "Unknown",
      filesize,
      type: "audio",
      note,
      abr: format.abr ?? 0,
    };
  }

  return null;
}

/**
 * Lists the downloadable formats in the order the engine returned them.
 * Duplicates are kept.
 */
export function getAvailableFormats(info: Pick<VideoInfo, "formats">): FormatRecord[] {
  const records: FormatRecord[] = [];
  for (const format of info.formats) {
    const record = toFormatRecord(format);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Short label for a format in the selection list.
 *
 * @example
 * describeFormat(video720) // => "720p · mp4 · 12.3 MB · 30fps"
 * describeFormat(audio128) // => "128kbps · m4a · Unknown"
 */
export function describeFormat(record: FormatRecord): string {
  const size = formatFileSize(record.filesize);

  if (record.type === "video") {
    const quality = record.quality === "Unknown" ? "Unknown" : `${record.quality}p`;
    const parts = [quality, record.ext, size];
    if (record.fps > 0) parts.push(`${record.fps}fps`);
    return parts.join(" · ");
  }

  const quality = record.quality === "Unknown" ? "Unknown" : `${Math.round(record.quality)}kbps`;
  return [quality, record.ext, size].join(" · ");
}
