import Conf from "conf";
import { config as loadDotenv } from "dotenv";
import { APP_DIR } from "./paths.js";
import { type Config, configSchema, resolveConfig } from "./schema.js";

/**
 * Application configuration store using conf package.
 * Provides atomic writes, dot-notation access, and safe defaults.
 */
const store = new Conf<Config>({
  projectName: "wakefetch",
  cwd: APP_DIR,
  configName: "config",
  defaults: configSchema.parse({}),
});

let dotenvLoaded = false;

/**
 * Loads the effective configuration: stored values, then environment
 * overrides (including a `.env` file in the working directory).
 */
export function loadConfig(): Config {
  if (!dotenvLoaded) {
    loadDotenv();
    dotenvLoaded = true;
  }
  return resolveConfig(store.store, process.env);
}

/**
 * Loads only the persisted values, validated and with defaults applied.
 */
export function loadStoredConfig(): Config {
  return resolveConfig(store.store);
}

/**
 * Updates specific stored config values.
 */
export function updateConfig(updates: Partial<Config>): Config {
  const updated = configSchema.parse({ ...loadStoredConfig(), ...updates });
  store.store = updated;
  return updated;
}

/**
 * Gets a specific stored config value.
 */
export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return loadStoredConfig()[key];
}

/**
 * Gets the path to the config file.
 */
export function getConfigPath(): string {
  return store.path;
}
