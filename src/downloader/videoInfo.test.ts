import { describe, expect, it, vi } from "vitest";
import type { MediaEngine } from "./types.js";
import { fetchVideoInfo, toVideoInfo } from "./videoInfo.js";

const engineReturning = (extractInfo: MediaEngine["extractInfo"]): MediaEngine => ({
  extractInfo: vi.fn(extractInfo),
  download: vi.fn(() => Promise.resolve({ filePath: null })),
});

describe("toVideoInfo", () => {
  it("applies defaults for every missing field", () => {
    expect(toVideoInfo({})).toEqual({
      title: "Unknown Title",
      duration: 0,
      thumbnail: "",
      uploader: "Unknown",
      viewCount: 0,
      uploadDate: "",
      description: "",
      formats: [],
    });
  });

  it("treats null like missing", () => {
    expect(toVideoInfo({ title: null, view_count: null }).title).toBe("Unknown Title");
  });

  it("maps engine field names", () => {
    const info = toVideoInfo({
      title: "Sample clip",
      duration: 212,
      thumbnail: "https://img.example/thumb.jpg",
      uploader: "Test Channel",
      view_count: 1500,
      upload_date: "20240115",
      description: "A test video",
      formats: [{ format_id: "18" }],
    });

    expect(info).toEqual({
      title: "Sample clip",
      duration: 212,
      thumbnail: "https://img.example/thumb.jpg",
      uploader: "Test Channel",
      viewCount: 1500,
      uploadDate: "20240115",
      description: "A test video",
      formats: [{ format_id: "18" }],
    });
  });
});

describe("fetchVideoInfo", () => {
  it("returns the info on success", async () => {
    const engine = engineReturning(() => Promise.resolve({ title: "Sample clip" }));

    const result = await fetchVideoInfo("https://youtu.be/ID", engine);

    expect(result.success).toBe(true);
    expect(result.info?.title).toBe("Sample clip");
    expect(engine.extractInfo).toHaveBeenCalledWith("https://youtu.be/ID");
  });

  it("converts engine errors into a message", async () => {
    const engine = engineReturning(() => Promise.reject(new Error("Video unavailable")));

    const result = await fetchVideoInfo("https://youtu.be/ID", engine);

    expect(result).toEqual({
      success: false,
      error: "Error extracting video info: Video unavailable",
      errorCode: "FETCH_FAILED",
    });
  });
});
