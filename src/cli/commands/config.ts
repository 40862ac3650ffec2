import chalk from "chalk";
import { getConfigPath, getConfigValue, loadConfig, updateConfig } from "../../config/configManager.js";
import { type Config, configSchema } from "../../config/schema.js";

const SECRET_KEYS: ReadonlySet<keyof Config> = new Set<keyof Config>(["sessionSecret"]);

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(configSchema.shape, key);
}

function validKeys(): string {
  return Object.keys(configSchema.shape).join(", ");
}

function displayValue(key: keyof Config, value: unknown): string {
  return SECRET_KEYS.has(key) ? "********" : String(value);
}

/**
 * Shows all effective configuration values, environment overrides included.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    const shown = isConfigKey(key) ? displayValue(key, value) : String(value);
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(shown)}`);
  }
  console.log();
}

/**
 * Sets a stored configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${validKeys()}\n`));
    process.exit(1);
  }

  // Parse value based on expected type
  const currentValue = getConfigValue(key);
  let parsedValue: string | number | boolean;

  if (typeof currentValue === "boolean") {
    parsedValue = value === "true" || value === "1";
  } else if (typeof currentValue === "number") {
    parsedValue = Number(value);
    if (!Number.isInteger(parsedValue)) {
      console.log(chalk.red(`\n❌ Invalid number: ${value}\n`));
      process.exit(1);
    }
  } else {
    parsedValue = value;
  }

  try {
    updateConfig({ [key]: parsedValue });
    console.log(chalk.green(`\n✅ Set ${key} = ${displayValue(key, parsedValue)}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Invalid value for ${key}: ${value}`));
    console.log(chalk.gray(`   ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}

/**
 * Prints a stored configuration value.
 */
export function configGetCommand(key: string): void {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${validKeys()}\n`));
    process.exit(1);
  }

  console.log(String(getConfigValue(key)));
}
