import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";
import { ProgressChannel } from "./progress.js";
import type { EngineDownloadRequest, MediaEngine } from "./types.js";
import { DOWNLOAD_DIR_PREFIX, createDownloadDirectory, downloadVideo } from "./download.js";

function engineWith(download: MediaEngine["download"]): MediaEngine {
  return {
    extractInfo: vi.fn(() => Promise.resolve({})),
    download: vi.fn(download),
  };
}

describe("createDownloadDirectory", () => {
  it("creates a new prefixed directory each time", async () => {
    const first = await createDownloadDirectory();
    const second = await createDownloadDirectory();
    try {
      expect(basename(first).startsWith(DOWNLOAD_DIR_PREFIX)).toBe(true);
      expect(first).not.toBe(second);
      expect((await stat(first)).isDirectory()).toBe(true);
    } finally {
      await rm(first, { recursive: true, force: true });
      await rm(second, { recursive: true, force: true });
    }
  });
});

describe("downloadVideo", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "download-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("passes format, title template and progress to the engine", async () => {
    let request: EngineDownloadRequest | undefined;
    const engine = engineWith(async (req) => {
      request = req;
      const filePath = join(dir, "Sample clip.mp4");
      await writeFile(filePath, "video-bytes");
      return { filePath };
    });

    await downloadVideo("https://youtu.be/ID", "18", dir, engine);

    expect(request?.url).toBe("https://youtu.be/ID");
    expect(request?.formatId).toBe("18");
    expect(request?.outputTemplate).toBe(join(dir, "%(title)s.%(ext)s"));
  });

  it("returns the exact path the engine wrote", async () => {
    const filePath = join(dir, "Sample clip.mp4");
    // A stray file that a directory listing could pick first
    await writeFile(join(dir, "Sample clip.f18.part"), "partial");
    const engine = engineWith(async () => {
      await writeFile(filePath, "video-bytes");
      return { filePath };
    });

    const result = await downloadVideo("https://youtu.be/ID", "18", dir, engine);

    expect(result).toEqual({ success: true, outputPath: filePath });
  });

  it("routes engine progress into the channel and finishes at 100%", async () => {
    const channel = new ProgressChannel();
    const percents: number[] = [];
    channel.subscribe((progress) => percents.push(progress.percent));
    const engine = engineWith(async (req) => {
      req.onProgress?.({ status: "downloading", downloadedBytes: 50, totalBytes: 200 });
      req.onProgress?.({ status: "downloading", downloadedBytes: 200, totalBytes: 200 });
      const filePath = join(dir, "clip.mp4");
      await writeFile(filePath, "video-bytes");
      return { filePath };
    });

    await downloadVideo("https://youtu.be/ID", "18", dir, engine, channel);

    expect(percents).toEqual([25, 100, 100]);
    expect(channel.lastPercent).toBe(100);
  });

  it("reports a missing output file", async () => {
    const engine = engineWith(() => Promise.resolve({ filePath: join(dir, "never-written.mp4") }));

    const result = await downloadVideo("https://youtu.be/ID", "18", dir, engine);

    expect(result).toEqual({
      success: false,
      error: "Download completed but file not found",
      errorCode: "FILE_NOT_FOUND",
    });
  });

  it("reports a run that printed no path", async () => {
    const engine = engineWith(() => Promise.resolve({ filePath: null }));

    const result = await downloadVideo("https://youtu.be/ID", "18", dir, engine);

    expect(result.errorCode).toBe("FILE_NOT_FOUND");
  });

  it("converts engine errors into a failure result", async () => {
    const engine = engineWith(() => Promise.reject(new Error("Requested format is not available")));

    const result = await downloadVideo("https://youtu.be/ID", "999", dir, engine);

    expect(result).toEqual({
      success: false,
      error: "Download failed: Requested format is not available",
      errorCode: "DOWNLOAD_FAILED",
    });
  });
});
