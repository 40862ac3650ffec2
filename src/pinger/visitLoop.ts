/**
 * Background loop that keeps a list of sites awake by visiting them on a
 * fixed interval.
 */
import { basename } from "node:path";
import delay from "delay";
import { readTextIfExists } from "../shared/fs.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { appendLogLines, formatLogLine } from "./activityLog.js";
import type { PageVisitor } from "./browserVisitor.js";
import type { PingerRuntime } from "./runtime.js";

export interface VisitCycleOptions {
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
  /** Clock used for the cycle's timestamp */
  now?: (() => Date) | undefined;
}

/**
 * Reads the newline-delimited URL list, trimming entries and dropping blanks.
 * Returns null when the list file doesn't exist.
 */
export async function readUrlList(path: string): Promise<string[] | null> {
  const content = await readTextIfExists(path);
  if (content === null) return null;
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

/**
 * Settles like `promise`, or rejects as soon as `signal` aborts.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Runs one pass over the URL list and appends its lines to the log.
 * Every line of a cycle carries the time the cycle started.
 *
 * @returns The lines written for this cycle.
 */
export async function runVisitCycle(
  runtime: PingerRuntime,
  visitor: PageVisitor,
  options: VisitCycleOptions = {}
): Promise<string[]> {
  const { signal, logger = createLogger("pinger"), now = () => new Date() } = options;
  const startedAt = now();
  const lines: string[] = [];

  const urls = await readUrlList(runtime.paths.weblistFile);

  if (urls === null) {
    const line = formatLogLine(startedAt, {
      kind: "missingList",
      fileName: basename(runtime.paths.weblistFile),
    });
    logger.warn(line);
    lines.push(line);
  } else {
    for (const url of urls) {
      if (signal?.aborted) break;

      let line: string;
      try {
        await untilAborted(visitor.visit(url), signal);
        line = formatLogLine(startedAt, { kind: "visited", url });
        logger.info(line);
      } catch (error) {
        // Abandoned mid-visit; the navigation ends when the browser closes
        if (signal?.aborted) break;
        const message = error instanceof Error ? error.message : String(error);
        line = formatLogLine(startedAt, { kind: "failed", url, message });
        logger.warn(line);
      }
      lines.push(line);

      if (signal?.aborted) break;
    }
  }

  await appendLogLines(runtime.paths.logFile, lines);
  return lines;
}

/**
 * Cancellable background task running visit cycles until stopped.
 * A task runs its loop at most once; further start() calls are no-ops.
 */
export class VisitTask {
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;
  private running = false;
  private readonly logger: Logger;

  constructor(
    private readonly runtime: PingerRuntime,
    private readonly visitor: PageVisitor,
    options: { logger?: Logger | undefined; signal?: AbortSignal | undefined } = {}
  ) {
    this.logger = options.logger ?? createLogger("pinger");
    if (options.signal?.aborted) {
      this.controller.abort();
    } else {
      options.signal?.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
  }

  /**
   * Starts the loop. Returns false if this task was already started.
   */
  start(): boolean {
    if (this.loop) {
      this.logger.debug("Visit loop already started; ignoring start()");
      return false;
    }
    this.running = true;
    this.loop = this.run()
      .catch((error: unknown) => {
        this.logger.error("Visit loop stopped unexpectedly", error);
      })
      .finally(() => {
        this.running = false;
      });
    return true;
  }

  /**
   * Signals the loop to stop and waits for the current cycle to wind down.
   */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.loop;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async run(): Promise<void> {
    const { signal } = this.controller;

    while (!signal.aborted) {
      try {
        await runVisitCycle(this.runtime, this.visitor, { signal, logger: this.logger });
      } catch (error) {
        // e.g. the log file is not writable; try again next cycle
        this.logger.error("Visit cycle failed", error);
      }

      if (signal.aborted) break;

      try {
        await delay(this.runtime.intervalMs, { signal });
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
  }
}
