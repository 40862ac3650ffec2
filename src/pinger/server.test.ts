import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getPingerPaths } from "../config/paths.js";
import { closeServer, listen, type ListeningServer } from "../shared/serve.js";
import type { PingerRuntime } from "./runtime.js";
import { createPingerApp } from "./server.js";

const silentLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("createPingerApp", () => {
  let dir: string;
  let runtime: PingerRuntime;
  let running: ListeningServer | undefined;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pinger-server-test-"));
    runtime = {
      paths: getPingerPaths(dir),
      bootRecord: { startedAt: new Date(2025, 8, 1, 12, 0, 0), restored: true },
      virtualEpoch: new Date(2025, 5, 13, 0, 0, 0),
      intervalMs: 30000,
      visitTimeoutMs: 0,
      recentLines: 2,
    };
  });

  afterEach(async () => {
    if (running) await closeServer(running.server);
    running = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it("renders the virtual time and the most recent log lines", async () => {
    await writeFile(runtime.paths.logFile, "one\ntwo\nthree\n", "utf-8");
    const app = createPingerApp(runtime, {
      now: () => new Date(2025, 8, 1, 13, 30, 15),
      logger: silentLogger(),
    });
    running = await listen(app, 0);

    const response = await fetch(`${running.url}/`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
    expect(html).toContain('<pre id="virtual-time">2025-06-13 01:30:15</pre>');
    expect(html).toContain('<div class="log-box" id="log">two<br>three</div>');
  });

  it("renders an empty log when nothing was logged yet", async () => {
    const app = createPingerApp(runtime, { logger: silentLogger() });
    running = await listen(app, 0);

    const html = await (await fetch(`${running.url}/`)).text();

    expect(html).toContain('<div class="log-box" id="log"></div>');
  });

  it("answers 500 when the log can't be read", async () => {
    // A directory where the log file should be makes the read fail
    await mkdir(runtime.paths.logFile);
    const logger = silentLogger();
    const app = createPingerApp(runtime, { logger });
    running = await listen(app, 0);

    const response = await fetch(`${running.url}/`);

    expect(response.status).toBe(500);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("has no other routes", async () => {
    const app = createPingerApp(runtime, { logger: silentLogger() });
    running = await listen(app, 0);

    const response = await fetch(`${running.url}/logs`);

    expect(response.status).toBe(404);
  });
});
