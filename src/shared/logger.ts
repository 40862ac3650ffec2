import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

/**
 * Creates a console logger prefixed with a time and a scope tag.
 * The minimum level comes from LOG_LEVEL (default: info).
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const minLevel: LogLevel = level ?? (isLogLevel(envLevel) ? envLevel : "info");

  const write = (entryLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[minLevel]) return;

    const time = chalk.dim(new Date().toLocaleTimeString("en-US", { hour12: false }));
    const tag = LEVEL_COLORS[entryLevel](entryLevel.toUpperCase().padEnd(5));
    const line = `${time} ${tag} ${chalk.magenta(`[${scope}]`)} ${message}`;

    if (entryLevel === "error" || entryLevel === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) => {
      write("error", message);
      if (error !== undefined) {
        const detail = error instanceof Error ? error.message : String(error);
        write("error", chalk.gray(`   ${detail}`));
      }
    },
  };
}
