import { escapeHtml } from "../shared/html.js";

export const STATUS_PAGE_TITLE = "Wake Web";

export interface StatusPageModel {
  /** Current virtual time, already formatted */
  virtualTime: string;
  /** Most recent log lines, oldest first */
  lines: readonly string[];
  title?: string | undefined;
}

/**
 * Renders the pinger's status page: the virtual uptime clock and the recent log.
 */
export function renderStatusPage(model: StatusPageModel): string {
  const title = escapeHtml(model.title ?? STATUS_PAGE_TITLE);
  const log = model.lines.map((line) => escapeHtml(line.trim())).join("<br>");

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${title}</title>
  <style>
    .log-box {
      height: 400px;
      overflow-y: auto;
      background: #f9f9f9;
      padding: 10px;
      border: 1px solid #ccc;
      border-radius: 5px;
      font-family: monospace;
      white-space: pre-wrap;
      color: #000;
    }
  </style>
</head>
<body>
  <h1>${title}</h1>
  <h3>Time running since:</h3>
  <pre id="virtual-time">${escapeHtml(model.virtualTime)}</pre>
  <h3>Request Log</h3>
  <div class="log-box" id="log">${log}</div>
</body>
</html>
`;
}
