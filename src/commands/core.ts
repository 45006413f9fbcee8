import fs from "node:fs";
import { Command } from "commander";
import { getGameDir } from "../lib/config.js";
import { downloadFile } from "../lib/download.js";
import { errorMessage, PackageNotFoundError } from "../lib/errors.js";
import { installCore } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { withSpinner } from "../lib/prompts.js";
import { fetchIndex, findPackage } from "../lib/registry.js";
import { CORE_PACKAGE } from "../lib/resolver.js";
import { withSession } from "../lib/session.js";

export const coreCommand = new Command("core")
  .description(`Install ${CORE_PACKAGE} itself into the game directory`)
  .option("-g, --game <dir>", "Game directory (defaults to paths.game from the config)")
  .action(async (options: { game?: string }) => {
    try {
      const gameDir = options.game ?? getGameDir();
      if (!gameDir) {
        throw new Error("No game directory given. Pass --game or run `modkeep config set paths.game <dir>`.");
      }

      await withSession(async ({ cache }) => {
        const catalog = await withSpinner("Fetching catalog...", () => fetchIndex());
        const core = findPackage(catalog, CORE_PACKAGE);
        const release = core?.versions[core.latest];
        if (!core || !release) {
          throw new PackageNotFoundError(CORE_PACKAGE);
        }

        let file = cache.get(core.name, release.version);
        if (file && fs.existsSync(file)) {
          logger.dim(`Using cached ${core.name} ${release.version}`);
        } else {
          file = await withSpinner(`Downloading ${core.name} ${release.version}...`, () =>
            downloadFile(release.url, cache.pathFor(core.name, release.version)),
          );
          cache.track(file);
        }

        const summary = installCore(fs.readFileSync(file), gameDir);
        cache.clean(core.name, release.version);
        logger.success(`Installed ${core.name} ${release.version} (${summary.written.length} files) → ${gameDir}`);
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
