import { basename } from "node:path";
import { readFile, removeDir } from "../shared/fs.js";
import { createDownloadDirectory, downloadVideo } from "./download.js";
import { ProgressChannel } from "./progress.js";
import type { DownloadSession } from "./session.js";
import type { MediaEngine } from "./types.js";

/**
 * Runs one download for a session and keeps the produced file in memory.
 *
 * Does nothing while the session already has a download in progress.
 * Errors end up in `session.error`; the temporary directory is removed and
 * the in-progress flag cleared whatever the outcome.
 */
export async function runDownloadFlow(
  session: DownloadSession,
  url: string,
  formatId: string,
  engine: MediaEngine
): Promise<void> {
  if (session.inProgress) return;

  session.inProgress = true;
  session.error = null;
  session.readyFile = null;
  session.progress = { percent: 0, message: "Starting download..." };

  const channel = new ProgressChannel();
  const unsubscribe = channel.subscribe((progress) => {
    session.progress = progress;
  });
  let outputDir: string | null = null;

  try {
    outputDir = await createDownloadDirectory();
    const result = await downloadVideo(url, formatId, outputDir, engine, channel);

    if (result.success && result.outputPath !== undefined) {
      session.readyFile = {
        fileName: basename(result.outputPath),
        data: await readFile(result.outputPath),
      };
    } else {
      session.error = result.error ?? "Download failed";
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    session.error = `An unexpected error occurred: ${message}`;
  } finally {
    unsubscribe();
    try {
      if (outputDir !== null) await removeDir(outputDir);
    } finally {
      session.inProgress = false;
    }
  }
}
