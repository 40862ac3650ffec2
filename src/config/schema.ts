import { z } from "zod";
import { TIMESTAMP_PATTERN } from "../shared/time.js";

/**
 * Default reference point of the pinger's virtual clock.
 */
export const DEFAULT_VIRTUAL_EPOCH = "2025-06-13 00:00:00";

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  dataDir: z.string().min(1).default("."),
  pingerPort: z.number().int().min(1).max(65535).default(5000),
  downloaderPort: z.number().int().min(1).max(65535).default(8501),
  visitIntervalSeconds: z.number().int().min(1).max(86400).default(30),
  visitTimeoutSeconds: z.number().int().min(0).max(3600).default(0),
  headless: z.boolean().default(true),
  virtualEpoch: z
    .string()
    .regex(TIMESTAMP_PATTERN, "Expected YYYY-MM-DD HH:MM:SS")
    .default(DEFAULT_VIRTUAL_EPOCH),
  logLines: z.number().int().min(1).max(1000).default(100),
  ytDlpPath: z.string().min(1).default("yt-dlp"),
  sessionSecret: z.string().min(8).default("wakefetch-dev-secret"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variables that override stored configuration values.
 */
export const ENV_OVERRIDES = {
  dataDir: "WAKEFETCH_DATA_DIR",
  pingerPort: "PINGER_PORT",
  downloaderPort: "DOWNLOADER_PORT",
  visitIntervalSeconds: "VISIT_INTERVAL",
  visitTimeoutSeconds: "VISIT_TIMEOUT",
  headless: "HEADLESS",
  virtualEpoch: "VIRTUAL_EPOCH",
  ytDlpPath: "YT_DLP_PATH",
  sessionSecret: "SESSION_SECRET",
} as const satisfies Partial<Record<keyof Config, string>>;

/**
 * Thrown when stored values or environment overrides fail validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Converts a raw environment string into the type of the config key it overrides.
 */
function coerceEnvValue(sample: unknown, raw: string): string | number | boolean {
  if (typeof sample === "boolean") {
    return raw === "true" || raw === "1";
  }
  if (typeof sample === "number") {
    return Number(raw);
  }
  return raw;
}

/**
 * Merges stored values with environment overrides and validates the result.
 * Environment values win over stored ones.
 */
export function resolveConfig(
  stored: Record<string, unknown>,
  env: Record<string, string | undefined> = {}
): Config {
  const defaults = configSchema.parse({});
  const merged: Record<string, unknown> = { ...stored };

  const overriddenKeys = Object.keys(ENV_OVERRIDES) as (keyof typeof ENV_OVERRIDES)[];
  for (const key of overriddenKeys) {
    const raw = env[ENV_OVERRIDES[key]];
    if (raw === undefined || raw === "") continue;
    merged[key] = coerceEnvValue(defaults[key], raw);
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
