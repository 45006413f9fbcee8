import { Command } from "commander";
import { errorMessage } from "../lib/errors.js";
import { uninstallMod } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { confirm } from "../lib/prompts.js";
import { withSession } from "../lib/session.js";

export const uninstallCommand = new Command("uninstall")
  .description("Remove installed packages")
  .argument("<packages...>", "Package names")
  .option("-y, --yes", "Don't ask for confirmation")
  .action(async (packages: string[], options: { yes?: boolean }) => {
    let failed = 0;
    try {
      logger.blank();
      await withSession(async ({ index }) => {
        for (const name of packages) {
          const pkg = index.getMod(name);
          if (pkg && pkg.dependents.length > 0 && !options.yes) {
            const go = await confirm(
              `${name} is needed by ${pkg.dependents.join(", ")}. Remove it anyway?`,
              false,
            );
            if (!go) continue;
          }
          try {
            uninstallMod(index, name);
            logger.success(`Uninstalled ${name}`);
          } catch (err) {
            failed++;
            logger.error(`${name}: ${errorMessage(err)}`);
          }
        }
      });
      logger.blank();
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
    if (failed > 0) process.exit(1);
  });
