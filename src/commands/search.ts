import { Command } from "commander";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withSpinner } from "../lib/prompts.js";
import { fetchIndex, fileSizeString, searchPackages } from "../lib/registry.js";

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export const searchCommand = new Command("search")
  .description("Search the catalog for packages")
  .argument("<query>", "Search query")
  .option("--json", "Output as JSON")
  .action(async (query: string, options: { json?: boolean }) => {
    try {
      const catalog = await withSpinner("Fetching catalog...", () => fetchIndex());
      const results = searchPackages(catalog, query);

      if (results.length === 0) {
        logger.info("No packages found matching your query.");
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }

      logger.blank();
      logger.table(
        ["name", "author", "version", "size", "description"],
        results.map((pkg) => {
          const latest = pkg.versions[pkg.latest];
          return [
            pkg.name,
            pkg.author,
            pkg.latest,
            latest ? fileSizeString(latest.fileSize) : "",
            truncate(latest?.description ?? "", 50),
          ];
        }),
      );
      logger.blank();
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
