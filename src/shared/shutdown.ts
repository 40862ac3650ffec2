/**
 * Graceful shutdown management for the long-running server commands.
 * Provides consistent signal handling and resource cleanup for both services.
 */
import type { Browser } from "playwright";
import chalk from "chalk";

/**
 * Resources that can be registered for cleanup on shutdown.
 */
export interface CleanupResources {
  browser?: Pick<Browser, "close"> | undefined;
  /** Generic cleanup function for additional resources (e.g., HTTP server) */
  onCleanup?: (() => Promise<void>) | undefined;
}

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Aborted as soon as shutdown begins; hand it to cancellable tasks. */
  signal: AbortSignal;
  /** Register a browser for cleanup on shutdown. */
  registerBrowser: (browser: Pick<Browser, "close">) => void;
  /** Register a cleanup callback for additional resources. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
}

/**
 * Creates a shutdown manager for graceful termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * shutdown.registerBrowser(browser);
 * shutdown.registerCleanup(() => task.stop());
 * ```
 */
export function createShutdownManager(): ShutdownManager {
  let shuttingDown = false;
  const controller = new AbortController();
  const resources: CleanupResources = {};

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      process.exit(1);
    }

    shuttingDown = true;
    controller.abort();
    console.log(chalk.yellow(`\n\n⏹️  ${signal} received, shutting down gracefully...`));

    try {
      // Run custom cleanup first
      if (resources.onCleanup) {
        await resources.onCleanup();
      }
      // Close browser last
      if (resources.browser) {
        await resources.browser.close();
      }
      console.log(chalk.gray("   Cleanup complete."));
    } catch (error) {
      console.log(chalk.red("   Cleanup failed"));
      console.log(chalk.gray(`   ${error instanceof Error ? error.message : String(error)}`));
    }

    process.exit(0);
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    signal: controller.signal,

    registerBrowser: (browser: Pick<Browser, "close">) => {
      resources.browser = browser;
    },

    registerCleanup: (fn: () => void | Promise<void>) => {
      const previousCleanup = resources.onCleanup;
      resources.onCleanup = async () => {
        if (previousCleanup) {
          await previousCleanup();
        }
        await fn();
      };
    },
  };
}
