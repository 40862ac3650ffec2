import { escapeHtml } from "../shared/html.js";
import { formatDuration, formatUploadDate, formatViewCount } from "../shared/format.js";
import { describeFormat } from "./formats.js";
import type { DownloadSession } from "./session.js";
import type { FormatRecord, VideoInfo } from "./types.js";

export const DOWNLOADER_PAGE_TITLE = "YouTube Downloader";

const POLL_INTERVAL_MS = 1000;

const STYLES = `
    body { font-family: sans-serif; max-width: 860px; margin: 2rem auto; padding: 0 1rem; }
    .error { color: #b00020; background: #fdecea; padding: 0.5rem 1rem; border-radius: 4px; }
    .video { display: flex; gap: 1rem; align-items: flex-start; }
    .video img { max-width: 320px; border-radius: 4px; }
    .formats { display: flex; gap: 2rem; }
    .formats ul { list-style: none; padding: 0; }
    .formats li { margin: 0.25rem 0; }
    progress { width: 100%; }
    button[disabled] { cursor: not-allowed; }`;

function renderFormatList(heading: string, formats: readonly FormatRecord[], disabled: boolean): string {
  const items = formats.map(
    (format) =>
      `<li><button type="submit" name="formatId" value="${escapeHtml(format.formatId)}"${disabled ? " disabled" : ""}>` +
      `${escapeHtml(describeFormat(format))}</button></li>`
  );
  const body = items.length > 0 ? `<ul>${items.join("")}</ul>` : "<p>None available</p>";
  return `<section><h3>${escapeHtml(heading)}</h3>${body}</section>`;
}

function renderVideo(info: VideoInfo, session: DownloadSession): string {
  const videos = session.formats.filter((format) => format.type === "video");
  const audios = session.formats.filter((format) => format.type === "audio");
  const thumbnail = info.thumbnail
    ? `<img src="${escapeHtml(info.thumbnail)}" alt="Thumbnail">`
    : "";

  return `
  <div class="video">
    ${thumbnail}
    <div>
      <h2 id="title">${escapeHtml(info.title)}</h2>
      <p>Uploader: ${escapeHtml(info.uploader)}</p>
      <p>Duration: ${formatDuration(info.duration)}</p>
      <p>Views: ${formatViewCount(info.viewCount)}</p>
      <p>Uploaded: ${escapeHtml(formatUploadDate(info.uploadDate))}</p>
    </div>
  </div>
  <form method="post" action="/download" class="formats">
    ${renderFormatList("Video formats", videos, session.inProgress)}
    ${renderFormatList("Audio formats", audios, session.inProgress)}
  </form>`;
}

function renderProgress(session: DownloadSession): string {
  const hidden = session.inProgress || session.progress.message !== "" ? "" : " hidden";
  return `
  <div id="progress-box"${hidden}>
    <progress id="progress" max="100" value="${session.progress.percent.toFixed(1)}"></progress>
    <p id="status">${escapeHtml(session.progress.message)}</p>
  </div>`;
}

function renderReadyFile(session: DownloadSession): string {
  if (!session.readyFile) return "";
  const name = escapeHtml(session.readyFile.fileName);
  return `<p id="ready"><a href="/file" download="${name}">Save ${name}</a></p>`;
}

/**
 * Polls `/progress` while a download runs and reloads once it stops.
 */
function renderPollingScript(): string {
  return `
  <script>
    (function () {
      var bar = document.getElementById("progress");
      var status = document.getElementById("status");
      function poll() {
        fetch("/progress", { credentials: "same-origin" })
          .then(function (response) { return response.json(); })
          .then(function (state) {
            bar.value = state.percent;
            status.textContent = state.message;
            if (state.inProgress) setTimeout(poll, ${POLL_INTERVAL_MS});
            else window.location.reload();
          })
          .catch(function () { setTimeout(poll, ${POLL_INTERVAL_MS}); });
      }
      setTimeout(poll, ${POLL_INTERVAL_MS});
    })();
  </script>`;
}

/**
 * Renders the download UI for one session.
 */
export function renderDownloaderPage(session: DownloadSession): string {
  const disabled = session.inProgress ? " disabled" : "";
  const error = session.error ? `<p class="error" id="error">${escapeHtml(session.error)}</p>` : "";
  const video = session.videoInfo ? renderVideo(session.videoInfo, session) : "";

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${DOWNLOADER_PAGE_TITLE}</title>
  <style>${STYLES}
  </style>
</head>
<body>
  <h1>${DOWNLOADER_PAGE_TITLE}</h1>
  <form method="post" action="/info">
    <input type="text" name="url" size="60" placeholder="https://www.youtube.com/watch?v=..." value="${escapeHtml(session.url)}">
    <button type="submit"${disabled}>Get Video Info</button>
  </form>
  ${error}${video}${renderProgress(session)}
  ${renderReadyFile(session)}${session.inProgress ? renderPollingScript() : ""}
</body>
</html>
`;
}
