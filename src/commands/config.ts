import { Command } from "commander";
import { getConfigValue, isConfigKey, setConfigValue, SETTABLE_KEYS } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

function checkKey(key: string): (typeof SETTABLE_KEYS)[number] {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key "${key}". Known keys: ${SETTABLE_KEYS.join(", ")}`);
  }
  return key;
}

const getCommand = new Command("get")
  .argument("<key>", "Config key")
  .action((key: string) => {
    try {
      const value = getConfigValue(checkKey(key));
      console.log(value === undefined ? "" : String(value));
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

const setCommand = new Command("set")
  .argument("<key>", "Config key")
  .argument("<value>", "New value")
  .action((key: string, value: string) => {
    try {
      setConfigValue(checkKey(key), value);
      logger.success(`${key} = ${value}`);
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

export const configCommand = new Command("config")
  .description("Read or change settings")
  .addCommand(getCommand)
  .addCommand(setCommand);
