import { Command } from "commander";
import * as p from "@clack/prompts";
import { errorMessage } from "../lib/errors.js";
import { installPackage } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { isInteractive, withSpinner } from "../lib/prompts.js";
import { packageContext, withSession } from "../lib/session.js";

export const installCommand = new Command("install")
  .description("Install packages from the catalog into the mods directory")
  .argument("<packages...>", "Package names or author-name-X.Y.Z modstrings")
  .option("-v, --version <version>", "Install a specific version (single package only)")
  .option("--no-deps", "Don't install missing dependencies")
  .action(async (packages: string[], options: { version?: string; deps?: boolean }) => {
    if (options.version && packages.length > 1) {
      logger.error("--version can only be used with a single package");
      process.exit(1);
    }

    const interactive = isInteractive();
    if (interactive) {
      p.intro(`Installing ${packages.join(", ")}`);
    } else {
      logger.blank();
    }

    let failed = 0;
    try {
      await withSession(async (session) => {
        const ctx = await withSpinner("Fetching catalog...", () => packageContext(session));
        for (const target of packages) {
          try {
            const installed = await withSpinner(`Installing ${target}...`, () =>
              installPackage(ctx, target, {
                ...(options.version ? { version: options.version } : {}),
                withDeps: options.deps !== false,
              }),
            );
            logger.dim(`${installed.mods.length} submod(s): ${installed.mods.map((m) => m.name).join(", ")}`);
          } catch (err) {
            failed++;
            logger.error(`${target}: ${errorMessage(err)}`);
          }
        }
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }

    if (interactive) {
      p.outro(failed === 0 ? "Done!" : `${failed} package(s) failed.`);
    } else {
      logger.blank();
    }
    if (failed > 0) process.exit(1);
  });
