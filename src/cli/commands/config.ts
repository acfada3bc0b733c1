import chalk from "chalk";
import { getConfigPath, getConfigValue, loadConfig, updateConfig } from "../../config/configManager.js";
import {
  CONFIG_KEYS,
  type ConfigKey,
  SECRET_KEYS,
  coerceConfigValue,
  isConfigKey,
} from "../../config/schema.js";

function maskValue(key: ConfigKey, value: unknown): string {
  if (SECRET_KEYS.includes(key) && value !== "") {
    return "********";
  }
  return String(value);
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exit(1);
  }
  return key;
}

/**
 * Shows all current configuration values. Credentials are masked.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const key of CONFIG_KEYS) {
    if (!isConfigKey(key)) continue;
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(maskValue(key, config[key]))}`);
  }
  console.log();
}

/**
 * Sets a configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  const configKey = requireKey(key);

  // Parse value based on expected type
  const parsedValue = coerceConfigValue(value, getConfigValue(configKey));
  if (parsedValue === null) {
    console.log(chalk.red(`\n❌ Invalid number: ${value}\n`));
    process.exit(1);
  }

  const updates: Partial<Record<ConfigKey, unknown>> = {};
  updates[configKey] = parsedValue;

  try {
    updateConfig(updates);
    console.log(chalk.green(`\n✅ Set ${configKey} = ${maskValue(configKey, parsedValue)}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Invalid value for ${configKey}: ${value}`));
    console.log(chalk.gray(`   ${String(error)}\n`));
    process.exit(1);
  }
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  console.log(String(getConfigValue(requireKey(key))));
}
