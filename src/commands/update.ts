import { Command } from "commander";
import * as p from "@clack/prompts";
import { errorMessage, NotInstalledError } from "../lib/errors.js";
import { getOutdated, updatePackages } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { isInteractive, withSpinner } from "../lib/prompts.js";
import { packageContext, withSession } from "../lib/session.js";

export const updateCommand = new Command("update")
  .description("Update installed packages to their latest versions")
  .argument("[package]", "Package name (omit to update all)")
  .action(async (packageName?: string) => {
    try {
      const interactive = isInteractive();

      if (interactive) {
        p.intro("Updating packages");
      } else {
        logger.blank();
      }

      const updatedCount = await withSession(async (session) => {
        if (session.index.listMods().length === 0) {
          logger.info("No packages installed.");
          return 0;
        }

        if (packageName && !session.index.hasMod(packageName)) {
          throw new NotInstalledError(packageName);
        }

        const ctx = await withSpinner("Fetching catalog...", () => packageContext(session));
        const outdated = getOutdated(ctx.catalog, session.index).filter(
          (remote) => !packageName || remote.name === packageName,
        );

        const updated = await withSpinner("Updating...", () => updatePackages(ctx, outdated));
        return updated.length;
      });

      if (updatedCount === 0) {
        logger.info("All packages are up to date.");
      } else {
        logger.success(`Updated ${updatedCount} package${updatedCount > 1 ? "s" : ""}.`);
      }

      if (interactive) {
        p.outro("Done!");
      } else {
        logger.blank();
      }
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
