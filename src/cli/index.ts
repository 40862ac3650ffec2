#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { ConfigError } from "../config/schema.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloaderCommand, type DownloaderOptions } from "./commands/downloader.js";
import { pingerCommand, type PingerOptions } from "./commands/pinger.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof ConfigError) {
        for (const issue of error.issues) {
          console.error(chalk.gray(`   ${issue}`));
        }
      } else if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("wakefetch")
  .description("Keep-alive pinger and YouTube download front-end")
  .version("0.1.0");

// Pinger
program
  .command("pinger")
  .description("Visit the sites in weblist.txt on an interval and serve the status page")
  .option("-p, --port <port>", "Status page port", parseInteger)
  .option("--host <host>", "Address to bind the status page to")
  .option("-d, --data-dir <dir>", "Directory holding weblist.txt, boot_time.txt and logs.txt")
  .option("-i, --interval <seconds>", "Seconds between visit cycles", parseInteger)
  .option("--visible", "Show browser window (default: headless)")
  .action(wrapAction((options: PingerOptions) => pingerCommand(options)));

// Downloader
program
  .command("downloader")
  .description("Serve the YouTube download UI")
  .option("-p, --port <port>", "UI port", parseInteger)
  .option("--host <host>", "Address to bind the UI to")
  .action(wrapAction((options: DownloaderOptions) => downloaderCommand(options)));

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd
  .command("show")
  .description("Show all configuration values")
  .action(wrapAction(async () => configShowCommand()));

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();
