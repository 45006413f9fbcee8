import { Command } from "commander";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withSession } from "../lib/session.js";

export const listCommand = new Command("list")
  .description("List all installed packages")
  .option("--submods", "Show one row per submod")
  .action(async (options: { submods?: boolean }) => {
    try {
      await withSession(async ({ index }) => {
        const packages = index.listMods();

        if (packages.length === 0) {
          logger.info("No packages installed. Run `modkeep install <package>` to get started.");
          return;
        }

        logger.blank();
        if (options.submods) {
          logger.table(
            ["submod", "package", "state", "location"],
            packages.flatMap((pkg) =>
              pkg.mods.map((sub) => [
                sub.name,
                pkg.name,
                sub.disabled ? "disabled" : "enabled",
                index.absolutePath(sub),
              ]),
            ),
          );
        } else {
          logger.table(
            ["name", "author", "version", "submods"],
            packages.map((pkg) => [
              pkg.name,
              pkg.author,
              pkg.version,
              String(pkg.mods.length),
            ]),
          );
        }
        logger.blank();

        for (const missing of index.verify()) {
          logger.warn(`Recorded but missing on disk: ${missing}`);
        }
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
