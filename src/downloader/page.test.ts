import { describe, expect, it } from "vitest";
import { renderDownloaderPage } from "./page.js";
import { createDownloadSession, type DownloadSession } from "./session.js";

function loadedSession(): DownloadSession {
  const session = createDownloadSession();
  session.url = "https://youtu.be/ID";
  session.videoInfo = {
    title: "Cats & <Dogs>",
    duration: 3725,
    thumbnail: "https://img.example/thumb.jpg",
    uploader: "Test Channel",
    viewCount: 1234567,
    uploadDate: "20240115",
    description: "",
    formats: [],
  };
  session.formats = [
    { formatId: "18", ext: "mp4", quality: 360, filesize: 1536, type: "video", note: "", fps: 30 },
    { formatId: "140", ext: "m4a", quality: 129.5, filesize: 0, type: "audio", note: "", abr: 129.5 },
  ];
  return session;
}

describe("renderDownloaderPage", () => {
  it("renders only the URL form for a new session", () => {
    const html = renderDownloaderPage(createDownloadSession());

    expect(html).toContain('<form method="post" action="/info">');
    expect(html).not.toContain('action="/download"');
    expect(html).not.toContain("<script>");
  });

  it("shows the video details with escaped text", () => {
    const html = renderDownloaderPage(loadedSession());

    expect(html).toContain('<h2 id="title">Cats &amp; &lt;Dogs&gt;</h2>');
    expect(html).toContain("<p>Duration: 01:02:05</p>");
    expect(html).toContain("<p>Views: 1,234,567</p>");
    expect(html).toContain("<p>Uploaded: 2024-01-15</p>");
    expect(html).toContain('<img src="https://img.example/thumb.jpg" alt="Thumbnail">');
    expect(html).toContain('value="https://youtu.be/ID"');
  });

  it("lists video and audio formats in separate sections", () => {
    const html = renderDownloaderPage(loadedSession());

    expect(html).toContain(
      '<section><h3>Video formats</h3><ul><li><button type="submit" name="formatId" value="18">360p · mp4 · 1.5 KB · 30fps</button></li></ul></section>'
    );
    expect(html).toContain(
      '<section><h3>Audio formats</h3><ul><li><button type="submit" name="formatId" value="140">130kbps · m4a · Unknown</button></li></ul></section>'
    );
  });

  it("says when a section has no formats", () => {
    const session = loadedSession();
    session.formats = [];

    const html = renderDownloaderPage(session);

    expect(html).toContain("<section><h3>Audio formats</h3><p>None available</p></section>");
  });

  it("disables the buttons and polls while a download runs", () => {
    const session = loadedSession();
    session.inProgress = true;
    session.progress = { percent: 42.25, message: "Progress: 42.3%" };

    const html = renderDownloaderPage(session);

    expect(html).toContain('<button type="submit" name="formatId" value="18" disabled>');
    expect(html).toContain('<button type="submit" disabled>Get Video Info</button>');
    expect(html).toContain('<progress id="progress" max="100" value="42.3"></progress>');
    expect(html).toContain('<p id="status">Progress: 42.3%</p>');
    expect(html).toContain('fetch("/progress"');
  });

  it("shows the error message", () => {
    const session = createDownloadSession();
    session.error = "Please enter a valid YouTube URL";

    const html = renderDownloaderPage(session);

    expect(html).toContain('<p class="error" id="error">Please enter a valid YouTube URL</p>');
  });

  it("links the finished file", () => {
    const session = loadedSession();
    session.readyFile = { fileName: "Sample clip.mp4", data: Buffer.from("x") };
    session.progress = { percent: 100, message: "Download completed!" };

    const html = renderDownloaderPage(session);

    expect(html).toContain('<p id="ready"><a href="/file" download="Sample clip.mp4">Save Sample clip.mp4</a></p>');
    expect(html).toContain('<div id="progress-box">');
    expect(html).not.toContain("<script>");
  });
});
