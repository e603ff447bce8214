import { Command } from "commander";
import chalk from "chalk";
import { stringify } from "yaml";
import {
  CONFIG_KEYS,
  CONFIG_PATH,
  getConfigValue,
  isConfigKey,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../config/index.js";
import { describeError } from "./shared.js";

function exitWith(error: unknown): never {
  console.error(chalk.red(describeError(error)));
  process.exit(1);
}

export const configCommand = new Command("config")
  .description("Show or change CLI settings (~/.ledloom/config.yaml)");

configCommand
  .command("show")
  .description("Print the effective configuration")
  .action(async () => {
    try {
      const config = await loadConfig();
      console.log(chalk.dim(`# ${CONFIG_PATH}`));
      console.log(stringify(config, { indent: 2 }).trimEnd());
    } catch (error) {
      exitWith(error);
    }
  });

configCommand
  .command("get")
  .description(`Print one value (${CONFIG_KEYS.join(", ")})`)
  .argument("<key>", "Config key")
  .action(async (key: string) => {
    try {
      if (!isConfigKey(key)) throw new Error(`Unknown config key "${key}"`);
      console.log(getConfigValue(await loadConfig(), key));
    } catch (error) {
      exitWith(error);
    }
  });

configCommand
  .command("set")
  .description("Set one value")
  .argument("<key>", "Config key")
  .argument("<value>", "New value")
  .action(async (key: string, value: string) => {
    try {
      if (!isConfigKey(key)) throw new Error(`Unknown config key "${key}"`);
      const config = setConfigValue(await loadConfig(), key, value);
      await saveConfig(config);
      console.log(chalk.green(`${key} = ${getConfigValue(config, key)}`));
    } catch (error) {
      exitWith(error);
    }
  });
