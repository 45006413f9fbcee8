import { Command } from "commander";
import { errorMessage } from "../lib/errors.js";
import { getOutdated } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { withSpinner } from "../lib/prompts.js";
import { packageContext, withSession } from "../lib/session.js";

export const outdatedCommand = new Command("outdated")
  .description("List installed packages with a newer version in the catalog")
  .action(async () => {
    try {
      await withSession(async (session) => {
        const ctx = await withSpinner("Fetching catalog...", () => packageContext(session));
        const outdated = getOutdated(ctx.catalog, session.index);

        if (outdated.length === 0) {
          logger.info("All packages are up to date.");
          return;
        }

        logger.blank();
        logger.table(
          ["name", "installed", "latest"],
          outdated.map((remote) => [
            remote.name,
            session.index.getMod(remote.name)?.version ?? "",
            remote.latest,
          ]),
        );
        logger.blank();
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
