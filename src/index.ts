#!/usr/bin/env node
import { Command } from "commander";
import { installCommand } from "./commands/install.js";
import { uninstallCommand } from "./commands/uninstall.js";
import { updateCommand } from "./commands/update.js";
import { outdatedCommand } from "./commands/outdated.js";
import { listCommand } from "./commands/list.js";
import { searchCommand } from "./commands/search.js";
import { infoCommand } from "./commands/info.js";
import { enableCommand, disableCommand } from "./commands/toggle.js";
import { cacheCommand } from "./commands/cache.js";
import { coreCommand } from "./commands/core.js";
import { configCommand } from "./commands/config.js";
import { logger } from "./lib/logger.js";

const program = new Command();

program
  .name("modkeep")
  .description("Install, update and manage Northstar mods from the Thunderstore catalog.")
  .version("0.1.0")
  .option("--verbose", "Print debug output")
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setVerbose(true);
    }
  });

program.addCommand(installCommand);
program.addCommand(uninstallCommand);
program.addCommand(updateCommand);
program.addCommand(outdatedCommand);
program.addCommand(listCommand);
program.addCommand(searchCommand);
program.addCommand(infoCommand);
program.addCommand(enableCommand);
program.addCommand(disableCommand);
program.addCommand(cacheCommand);
program.addCommand(coreCommand);
program.addCommand(configCommand);

await program.parseAsync();
