import { join } from "node:path";
import { makeTempDir, pathExists } from "../shared/fs.js";
import type { ProgressChannel } from "./progress.js";
import type { DownloadResult, MediaEngine } from "./types.js";

export const DOWNLOAD_DIR_PREFIX = "youtube_download_";
export const OUTPUT_FILENAME_TEMPLATE = "%(title)s.%(ext)s";

/**
 * Creates a fresh temporary directory for one download.
 */
export async function createDownloadDirectory(): Promise<string> {
  return makeTempDir(DOWNLOAD_DIR_PREFIX);
}

/**
 * Downloads one format into `outputDir`, named after the video title.
 * Never throws: engine failures and a missing output file come back as
 * `{ success: false }` with a message for the UI.
 */
export async function downloadVideo(
  url: string,
  formatId: string,
  outputDir: string,
  engine: MediaEngine,
  channel?: ProgressChannel
): Promise<DownloadResult> {
  try {
    const { filePath } = await engine.download({
      url,
      formatId,
      outputTemplate: join(outputDir, OUTPUT_FILENAME_TEMPLATE),
      onProgress: (event) => channel?.publish(event),
    });

    if (filePath === null || !(await pathExists(filePath))) {
      return {
        success: false,
        error: "Download completed but file not found",
        errorCode: "FILE_NOT_FOUND",
      };
    }

    channel?.publish({ status: "finished" });
    return { success: true, outputPath: filePath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      error: `Download failed: ${message}`,
      errorCode: "DOWNLOAD_FAILED",
    };
  }
}
