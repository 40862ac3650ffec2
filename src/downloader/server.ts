import express, { type Express, type NextFunction, type Request, type Response } from "express";
import session from "express-session";
import { z } from "zod";
import { createLogger, type Logger } from "../shared/logger.js";
import { runDownloadFlow } from "./flow.js";
import { renderDownloaderPage } from "./page.js";
import { SessionRegistry, loadVideo, type DownloadSession } from "./session.js";
import type { MediaEngine } from "./types.js";

export interface DownloaderAppOptions {
  /** Signs the session cookie */
  sessionSecret: string;
  logger?: Logger | undefined;
  sessions?: SessionRegistry | undefined;
}

/**
 * State returned by `GET /progress`, polled by the page during a download.
 */
export interface ProgressResponse {
  inProgress: boolean;
  percent: number;
  message: string;
  error: string | null;
  ready: boolean;
}

const infoFormSchema = z.object({ url: z.string() });
const downloadFormSchema = z.object({ formatId: z.string().min(1) });

export function toProgressResponse(state: DownloadSession): ProgressResponse {
  return {
    inProgress: state.inProgress,
    percent: state.progress.percent,
    message: state.progress.message,
    error: state.error,
    ready: state.readyFile !== null,
  };
}

/**
 * Creates the download UI server. Each browser gets its own download
 * session through a session cookie.
 */
export function createDownloaderApp(engine: MediaEngine, options: DownloaderAppOptions): Express {
  const logger = options.logger ?? createLogger("downloader");
  const sessions = options.sessions ?? new SessionRegistry();
  const app = express();

  app.disable("x-powered-by");
  app.use(
    session({
      secret: options.sessionSecret,
      resave: false,
      saveUninitialized: true,
      // Store entries expire with the download sessions they point at
      rolling: true,
      cookie: { httpOnly: true, sameSite: "lax", maxAge: sessions.idleTimeoutMs },
    })
  );
  app.use(express.urlencoded({ extended: false }));

  const current = (req: Request): DownloadSession => sessions.get(req.sessionID);

  app.get("/", (req: Request, res: Response) => {
    res.type("html").send(renderDownloaderPage(current(req)));
  });

  app.post("/info", (req: Request, res: Response, next: NextFunction) => {
    const state = current(req);
    const form = infoFormSchema.safeParse(req.body);
    const url = form.success ? form.data.url : "";

    loadVideo(state, url, engine)
      .then((loaded) => {
        if (loaded) logger.info(`Loaded video info for ${url.trim()}`);
        res.redirect(303, "/");
      })
      .catch(next);
  });

  app.post("/download", (req: Request, res: Response) => {
    const state = current(req);
    // A second post while downloading is a no-op
    if (state.inProgress) {
      res.redirect(303, "/");
      return;
    }

    const form = downloadFormSchema.safeParse(req.body);
    if (!state.videoInfo) {
      state.error = "Fetch the video info first";
    } else if (!form.success || !state.formats.some((f) => f.formatId === form.data.formatId)) {
      state.error = "Please select an available format";
    } else {
      const formatId = form.data.formatId;
      logger.info(`Downloading format ${formatId} of ${state.url}`);
      runDownloadFlow(state, state.url, formatId, engine).catch((error: unknown) => {
        logger.error("Download flow failed", error);
      });
    }

    res.redirect(303, "/");
  });

  app.get("/progress", (req: Request, res: Response) => {
    res.set("Cache-Control", "no-store").json(toProgressResponse(current(req)));
  });

  app.get("/file", (req: Request, res: Response) => {
    const ready = current(req).readyFile;
    if (!ready) {
      res.status(404).type("text").send("No file is ready");
      return;
    }
    res.attachment(ready.fileName);
    res.type("application/octet-stream").send(ready.data);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Request failed", error);
    res.status(500).type("text").send("Internal Server Error");
  });

  return app;
}
