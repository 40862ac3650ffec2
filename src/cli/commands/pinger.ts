import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { type Config, resolveConfig } from "../../config/schema.js";
import { BrowserVisitor } from "../../pinger/browserVisitor.js";
import { createPingerRuntime } from "../../pinger/runtime.js";
import { createPingerApp } from "../../pinger/server.js";
import { VisitTask } from "../../pinger/visitLoop.js";
import { createLogger } from "../../shared/logger.js";
import { closeServer, listen } from "../../shared/serve.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { formatTimestamp } from "../../shared/time.js";

export interface PingerOptions {
  port?: number;
  host?: string;
  dataDir?: string;
  interval?: number;
  visible?: boolean;
}

function withOverrides(config: Config, options: PingerOptions): Config {
  return resolveConfig({
    ...config,
    pingerPort: options.port ?? config.pingerPort,
    dataDir: options.dataDir ?? config.dataDir,
    visitIntervalSeconds: options.interval ?? config.visitIntervalSeconds,
    headless: options.visible ? false : config.headless,
  });
}

/**
 * Starts the keep-alive pinger: the background visit loop and the status page.
 * Runs until SIGINT/SIGTERM.
 */
export async function pingerCommand(options: PingerOptions): Promise<void> {
  const config = withOverrides(loadConfig(), options);
  const logger = createLogger("pinger");

  const shutdown = createShutdownManager();
  shutdown.setup();

  console.log(chalk.blue("\n⏰ Wake Web pinger\n"));

  const runtime = await createPingerRuntime(config);
  const bootLabel = runtime.bootRecord.restored ? "restored" : "recorded";
  console.log(chalk.gray(`   Boot time: ${formatTimestamp(runtime.bootRecord.startedAt)} (${bootLabel})`));
  console.log(chalk.gray(`   URL list:  ${runtime.paths.weblistFile}`));
  console.log(chalk.gray(`   Log file:  ${runtime.paths.logFile}`));
  console.log(chalk.gray(`   Interval:  ${config.visitIntervalSeconds}s\n`));

  const spinner = ora("Launching browser...").start();
  let visitor: BrowserVisitor;
  try {
    visitor = await BrowserVisitor.launch({
      headless: config.headless,
      timeoutMs: runtime.visitTimeoutMs,
    });
    spinner.succeed("Browser ready");
  } catch (error) {
    spinner.fail("Failed to launch browser");
    console.log(chalk.gray("   Install Chromium with: npx playwright install chromium"));
    throw error;
  }
  shutdown.registerBrowser(visitor.browser);

  const task = new VisitTask(runtime, visitor, { logger, signal: shutdown.signal });
  shutdown.registerCleanup(() => task.stop());
  task.start();

  const app = createPingerApp(runtime, { logger: createLogger("status") });
  try {
    const { server, url } = await listen(app, config.pingerPort, options.host);
    shutdown.registerCleanup(() => closeServer(server));
    console.log(chalk.green(`\n✅ Status page at ${url}`));
    console.log(chalk.gray("   Press Ctrl+C to stop.\n"));
  } catch (error) {
    await task.stop();
    await visitor.close();
    throw error;
  }
}
