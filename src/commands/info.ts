import { Command } from "commander";
import { errorMessage, PackageNotFoundError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { fetchIndex, fileSizeString, findPackage } from "../lib/registry.js";
import { withSession } from "../lib/session.js";

export const infoCommand = new Command("info")
  .description("Show detailed info about a package")
  .argument("<package>", "Package name")
  .action(async (packageName: string) => {
    try {
      const catalog = await fetchIndex();
      const remote = findPackage(catalog, packageName);
      if (!remote) {
        throw new PackageNotFoundError(packageName);
      }
      const latest = remote.versions[remote.latest];

      logger.blank();
      logger.bold(`${remote.fullName}-${remote.latest}`);
      logger.blank();

      console.log(`  Description:  ${latest?.description ?? ""}`);
      console.log(`  Author:       ${remote.author}`);
      console.log(`  Size:         ${latest ? fileSizeString(latest.fileSize) : "unknown"}`);
      console.log(`  Versions:     ${Object.keys(remote.versions).join(", ")}`);
      if (latest && latest.deps.length > 0) {
        console.log(`  Dependencies: ${latest.deps.join(", ")}`);
      }

      await withSession(async ({ index }) => {
        const installed = index.getMod(remote.name);
        if (!installed) return;
        logger.blank();
        logger.bold(`  Installed ${installed.version}`);
        for (const sub of installed.mods) {
          console.log(`    ${sub.name}${sub.disabled ? " (disabled)" : ""}`);
        }
      });

      logger.blank();
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
