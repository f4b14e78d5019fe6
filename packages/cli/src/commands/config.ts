import chalk from "chalk";

import { CardSdkError } from "@cardkit/shared";
import { ConfigManager, DEFAULT_CONFIG, type SdkConfig } from "@cardkit/sdk";

export type ConfigCommandArgs = {
  config?: string;
  key?: string;
  value?: string;
};

function isConfigKey(key: string): key is keyof SdkConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function parseValue(raw: string): string | boolean {
  if (raw === "true") {
    return true;
  }
  if (raw === "false") {
    return false;
  }
  return raw;
}

function manager(path?: string): ConfigManager {
  return path ? new ConfigManager(path) : new ConfigManager();
}

export async function runShow(argv: ConfigCommandArgs): Promise<void> {
  const config = manager(argv.config).load();
  console.log(JSON.stringify(config, null, 2));
}

export async function runSet(argv: ConfigCommandArgs): Promise<void> {
  const { key, value } = argv;
  if (!key || value === undefined) {
    console.error(chalk.red("Usage: cardkit config set <key> <value>"));
    process.exitCode = 2;
    return;
  }
  if (!isConfigKey(key)) {
    console.error(chalk.red(`Unknown config key: ${key}`));
    process.exitCode = 2;
    return;
  }

  try {
    const patch: Record<string, unknown> = { [key]: parseValue(value) };
    const config = manager(argv.config).update(patch);
    console.info(chalk.green(`${key} = ${JSON.stringify(config[key])}`));
  } catch (error) {
    if (!(error instanceof CardSdkError)) {
      throw error;
    }
    console.error(chalk.red(error.message));
    process.exitCode = 1;
  }
}
