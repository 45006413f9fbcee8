import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { EnabledMods, ENABLED_MODS_FILE } from "../lib/enabled-mods.js";
import { errorMessage } from "../lib/errors.js";
import { setSubmodEnabled } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { withSession } from "../lib/session.js";

/** Mirrors the new state into enabledmods.json when the game has one. */
function recordInEnabledMods(root: string, submod: string, enabled: boolean): void {
  const file = path.join(path.dirname(root), ENABLED_MODS_FILE);
  if (!fs.existsSync(file)) return;
  const enabledMods = EnabledMods.load(file);
  enabledMods.set(submod, enabled);
  if (enabledMods.close()) logger.dim(`Updated ${file}`);
}

function toggleCommand(name: "enable" | "disable", enabled: boolean): Command {
  return new Command(name)
    .description(`${enabled ? "Enable" : "Disable"} an installed submod`)
    .argument("<submod>", "Submod name, as in its mod.json")
    .action(async (submod: string) => {
      try {
        await withSession(async ({ index }) => {
          const result = setSubmodEnabled(index, submod, enabled);
          if (!result) {
            throw new Error(`No installed submod named '${submod}'.`);
          }
          if (!result.changed) {
            logger.dim(`${submod} is already ${enabled ? "enabled" : "disabled"}`);
            return;
          }
          recordInEnabledMods(index.root, submod, enabled);
          logger.success(`${enabled ? "Enabled" : "Disabled"} ${submod} (${result.packageName})`);
        });
      } catch (err) {
        logger.error(errorMessage(err));
        process.exit(1);
      }
    });
}

export const enableCommand = toggleCommand("enable", true);
export const disableCommand = toggleCommand("disable", false);
