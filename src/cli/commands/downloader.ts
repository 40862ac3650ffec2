import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { configSchema, resolveConfig } from "../../config/schema.js";
import { createDownloaderApp } from "../../downloader/server.js";
import { YtDlpEngine } from "../../downloader/ytDlp.js";
import { createLogger } from "../../shared/logger.js";
import { closeServer, listen } from "../../shared/serve.js";
import { createShutdownManager } from "../../shared/shutdown.js";

export interface DownloaderOptions {
  port?: number;
  host?: string;
}

/**
 * Starts the YouTube download UI. Runs until SIGINT/SIGTERM.
 */
export async function downloaderCommand(options: DownloaderOptions): Promise<void> {
  const loaded = loadConfig();
  const config = resolveConfig({
    ...loaded,
    downloaderPort: options.port ?? loaded.downloaderPort,
  });

  const shutdown = createShutdownManager();
  shutdown.setup();

  console.log(chalk.blue("\n🎬 YouTube downloader\n"));

  const engine = new YtDlpEngine(config.ytDlpPath);
  const spinner = ora(`Checking ${config.ytDlpPath}...`).start();
  const version = await engine.version();
  if (version) {
    spinner.succeed(`yt-dlp ${version}`);
  } else {
    // Metadata and downloads will fail with the engine's own error until it's installed
    spinner.warn(`${config.ytDlpPath} not found; install yt-dlp or set ytDlpPath`);
  }

  if (config.sessionSecret === configSchema.parse({}).sessionSecret) {
    console.log(chalk.yellow("   Using the default session secret; set SESSION_SECRET for shared hosts."));
  }

  const app = createDownloaderApp(engine, {
    sessionSecret: config.sessionSecret,
    logger: createLogger("downloader"),
  });
  const { server, url } = await listen(app, config.downloaderPort, options.host);
  shutdown.registerCleanup(() => closeServer(server));

  console.log(chalk.green(`\n✅ Downloader at ${url}`));
  console.log(chalk.gray("   Press Ctrl+C to stop.\n"));
}
