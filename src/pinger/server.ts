import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createLogger, type Logger } from "../shared/logger.js";
import { formatTimestamp } from "../shared/time.js";
import { readRecentLogLines } from "./activityLog.js";
import { virtualNow } from "./bootTime.js";
import type { PingerRuntime } from "./runtime.js";
import { renderStatusPage } from "./statusPage.js";

export interface PingerAppOptions {
  logger?: Logger | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Creates the status server. It has a single route, `GET /`.
 */
export function createPingerApp(runtime: PingerRuntime, options: PingerAppOptions = {}): Express {
  const logger = options.logger ?? createLogger("status");
  const now = options.now ?? (() => new Date());
  const app = express();

  app.disable("x-powered-by");

  app.get("/", (_req: Request, res: Response, next: NextFunction) => {
    readRecentLogLines(runtime.paths.logFile, runtime.recentLines)
      .then((lines) => {
        const virtualTime = formatTimestamp(
          virtualNow(runtime.bootRecord, runtime.virtualEpoch, now())
        );
        res.type("html").send(renderStatusPage({ virtualTime, lines }));
      })
      .catch(next);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Failed to render status page", error);
    res.status(500).type("text").send("Internal Server Error");
  });

  return app;
}
