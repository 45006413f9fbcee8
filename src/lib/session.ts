import type { RemotePackage } from "../types/index.js";
import { Cache } from "./cache.js";
import { getCacheDir, getIndexPath, getModsDir, readConfig } from "./config.js";
import type { ProgressFn } from "./download.js";
import type { PackageContext } from "./installer.js";
import { LocalIndex } from "./local-index.js";
import { logger } from "./logger.js";
import { ModstringParser } from "./modstring.js";
import { fetchIndex } from "./registry.js";

export interface Session {
  parser: ModstringParser;
  index: LocalIndex;
  cache: Cache;
}

/**
 * Opens the configured local index and cache. A configured `paths.mods`
 * replaces the root stored in the index. Every session must end with
 * `closeSession`, on success and failure alike.
 */
export function openSession(): Session {
  const modsDir = getModsDir();
  const index = LocalIndex.loadOrCreate(getIndexPath(), modsDir);
  if (readConfig().paths?.mods !== undefined && index.root !== modsDir) {
    if (index.listMods().length > 0) {
      logger.warn(
        `Mods directory moved from ${index.root} to ${modsDir}; recorded packages are looked up in the new directory`,
      );
    }
    index.root = modsDir;
  }
  return {
    parser: new ModstringParser(),
    index,
    cache: Cache.build(getCacheDir()),
  };
}

export function closeSession(session: Session): void {
  if (session.index.close()) {
    logger.debug(`Saved ${session.index.filePath ?? "local index"}`);
  }
}

/** Runs `fn` inside a session and always flushes the index afterwards. */
export async function withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
  const session = openSession();
  try {
    return await fn(session);
  } finally {
    closeSession(session);
  }
}

export async function packageContext(
  session: Session,
  onProgress?: ProgressFn,
): Promise<PackageContext> {
  const catalog: RemotePackage[] = await fetchIndex();
  return { ...session, catalog, ...(onProgress ? { onProgress } : {}) };
}
