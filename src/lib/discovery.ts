import fs from "node:fs";
import path from "node:path";
import type { DiscoveredSubmod, Discovery, InstalledMod, ModJson } from "../types/index.js";
import { NoModDirectoryError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { MOD_JSON_FILE, readAuthor, readManifest, readModJson } from "./manifest.js";

/** Folder some packages use to ship several independent submods. */
export const MODS_FOLDER = "mods";

/** Directory segment marking a submod as disabled. */
export const DISABLED_DIR = ".disabled";

export function byNameInsensitive<T extends { name: string }>(a: T, b: T): number {
  const la = a.name.toLowerCase();
  const lb = b.name.toLowerCase();
  return la < lb ? -1 : la > lb ? 1 : 0;
}

/** Relative paths (forward slashes) of every descriptor below `root`, shallowest first. */
function findDescriptors(root: string): string[] {
  const found: string[] = [];
  let level = [""];

  while (level.length > 0) {
    const next: string[] = [];
    for (const rel of level) {
      const entries = fs.readdirSync(path.join(root, rel), { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const entry of entries) {
        const child = rel === "" ? entry.name : `${rel}/${entry.name}`;
        if (entry.isDirectory()) {
          next.push(child);
        } else if (entry.isFile() && entry.name === MOD_JSON_FILE) {
          found.push(child);
        }
      }
    }
    level = next;
  }

  return found;
}

/**
 * The submod directory a descriptor belongs to: its top-level directory, or
 * the child of `mods` holding it.
 */
export function submodDirFor(descriptor: string): string | undefined {
  const segments = descriptor.split("/");
  const top = segments[0];
  if (segments.length < 2 || top === undefined) return undefined;
  if (top !== MODS_FOLDER) return top;

  const child = segments[1];
  if (segments.length < 3 || child === undefined) return undefined;
  return `${MODS_FOLDER}/${child}`;
}

function loadDescriptor(root: string, descriptor: string, dir: string): ModJson {
  try {
    return readModJson(path.join(root, descriptor));
  } catch (err) {
    const fallback = path.posix.basename(dir);
    logger.warn(`Unreadable ${descriptor}, naming submod "${fallback}": ${errorMessage(err)}`);
    return { name: fallback, description: "", version: "", extra: {} };
  }
}

/**
 * Finds the installable submods inside an extracted package.
 */
export function discoverSubmods(root: string): Discovery {
  const manifest = readManifest(root);
  const submods: DiscoveredSubmod[] = [];
  const seen = new Set<string>();

  for (const descriptor of findDescriptors(root)) {
    const dir = submodDirFor(descriptor);
    if (!dir) {
      logger.debug(`Ignoring descriptor outside a submod directory: ${descriptor}`);
      continue;
    }
    if (seen.has(dir)) continue;
    seen.add(dir);

    const parsed = loadDescriptor(root, descriptor, dir);
    logger.debug(`Add submod ${parsed.name} at ${dir}`);
    submods.push({ name: parsed.name, path: dir, descriptor: parsed });
  }

  if (submods.length === 0) {
    throw new NoModDirectoryError(root);
  }

  submods.sort(byNameInsensitive);
  return manifest ? { manifest, submods } : { submods };
}

function readInstalled(dir: string, disabled: boolean, relPath: string): InstalledMod | undefined {
  const descriptor = path.join(dir, MOD_JSON_FILE);
  if (!fs.existsSync(descriptor)) return undefined;
  try {
    const manifest = readManifest(dir);
    const author = readAuthor(dir);
    return {
      path: relPath,
      disabled,
      modJson: readModJson(descriptor),
      ...(manifest ? { manifest } : {}),
      ...(author !== undefined ? { author } : {}),
    };
  } catch (err) {
    logger.warn(`Skipping ${dir}: ${errorMessage(err)}`);
    return undefined;
  }
}

/**
 * Lists submods installed in a mods directory, including disabled ones.
 */
export function findMods(modsDir: string): InstalledMod[] {
  const found: InstalledMod[] = [];
  const scan = (base: string, disabled: boolean) => {
    if (!fs.existsSync(base)) return;
    for (const entry of fs.readdirSync(base, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) continue;
      const mod = readInstalled(path.join(base, entry.name), disabled, entry.name);
      if (mod) found.push(mod);
    }
  };

  scan(modsDir, false);
  scan(path.join(modsDir, DISABLED_DIR), true);
  return found.sort((a, b) => byNameInsensitive(a.modJson, b.modJson));
}
