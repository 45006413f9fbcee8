import { Command } from "commander";
import { clearCache } from "../lib/cache.js";
import { getCacheDir } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withSession } from "../lib/session.js";

const cleanCommand = new Command("clean")
  .description("Delete cached archives of versions that aren't installed")
  .action(async () => {
    try {
      await withSession(async ({ index, cache }) => {
        const names = new Set(cache.entries().map((e) => e.name));
        let cleaned = 0;
        for (const name of names) {
          const keep = index.getMod(name)?.version ?? "";
          if (cache.clean(name, keep)) cleaned++;
        }
        logger.success(
          cleaned === 0 ? "Cache is already clean." : `Cleaned cached archives of ${cleaned} package(s).`,
        );
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

const clearCommand = new Command("clear")
  .description("Delete every cached archive")
  .option("-f, --force", "Delete every file in the cache directory, not only archives")
  .action((options: { force?: boolean }) => {
    try {
      const removed = clearCache(getCacheDir(), options.force ?? false);
      logger.success(`Removed ${removed} file(s) from the cache.`);
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });

export const cacheCommand = new Command("cache")
  .description("Manage downloaded archives")
  .addCommand(cleanCommand)
  .addCommand(clearCommand);
