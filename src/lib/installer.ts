import fs from "node:fs";
import path from "node:path";
import type {
  DiscoveredSubmod,
  InstallRequest,
  InstallResult,
  InstalledPackage,
  RemotePackage,
  RemoteVersion,
  SanityCheck,
  SubMod,
  UninstallResult,
} from "../types/index.js";
import { extractArchive, extractPrefixed, withScratchDir, type ExtractSummary } from "./archive.js";
import type { Cache } from "./cache.js";
import { byNameInsensitive, discoverSubmods, MODS_FOLDER } from "./discovery.js";
import { downloadFile, type ProgressFn } from "./download.js";
import {
  IoError,
  NotInstalledError,
  PackageNotFoundError,
  PathPrefixError,
  SanityFailedError,
  errorMessage,
  toModkeepError,
} from "./errors.js";
import { physicalPath, type LocalIndex } from "./local-index.js";
import { installLock, type InstallLock } from "./lock.js";
import { logger } from "./logger.js";
import { AUTHOR_FILE, MANIFEST_FILE } from "./manifest.js";
import { ModstringParser } from "./modstring.js";
import { findPackage } from "./registry.js";
import { resolveDeps } from "./resolver.js";

const CORE_ARCHIVE_PREFIX = "Northstar";

export interface InstallOptions {
  parser?: ModstringParser;
  lock?: InstallLock;
}

interface StagedSubmod {
  name: string;
  /** Staged directory inside the scratch area. */
  source: string;
  /** Location relative to the install root. */
  relative: string;
}

interface Move {
  from: string;
  to: string;
  backup?: string;
  done: boolean;
}

/**
 * Location of a discovered submod relative to the install root: children of
 * `mods/` lose the prefix, top-level directories keep their name.
 */
export function permanentPath(submodPath: string): string {
  const segments = submodPath.split("/");
  if (segments[0] !== MODS_FOLDER) return submodPath;

  const rel = path.posix.relative(MODS_FOLDER, submodPath);
  if (rel === "" || rel.startsWith("..")) {
    throw new PathPrefixError(submodPath, MODS_FOLDER);
  }
  return rel;
}

/** Renames a directory, copying instead when source and target are on different devices. */
function moveDir(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) throw err;
    fs.cpSync(from, to, { recursive: true });
    fs.rmSync(from, { recursive: true, force: true });
  }
}

async function runSanityCheck(check: SanityCheck | undefined, archive: Buffer): Promise<void> {
  if (!check) return;
  let ok: boolean;
  try {
    ok = await check(archive);
  } catch (err) {
    throw new SanityFailedError(errorMessage(err), err);
  }
  if (!ok) {
    throw new SanityFailedError("archive rejected");
  }
}

function stage(
  extracted: string,
  submods: DiscoveredSubmod[],
  author: string,
  hasManifest: boolean,
): StagedSubmod[] {
  const staged: StagedSubmod[] = [];
  const targets = new Set<string>();

  for (const sub of submods) {
    const relative = permanentPath(sub.path);
    if (targets.has(relative)) {
      logger.warn(`Skipping submod ${sub.name}: ${relative} is already taken by another submod`);
      continue;
    }
    targets.add(relative);

    const source = path.join(extracted, sub.path);
    if (hasManifest) {
      fs.copyFileSync(path.join(extracted, MANIFEST_FILE), path.join(source, MANIFEST_FILE));
    }
    fs.writeFileSync(path.join(source, AUTHOR_FILE), author, "utf-8");
    staged.push({ name: sub.name, source, relative });
  }

  return staged;
}

function rollback(moves: Move[]): void {
  for (const move of [...moves].reverse()) {
    try {
      if (move.done) moveDir(move.to, move.from);
      if (move.backup) moveDir(move.backup, move.to);
    } catch (err) {
      logger.error(`Unable to restore ${move.to}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Moves every staged submod into the install root. Previous occupants are
 * parked in `backupDir`; if one move fails, everything is put back.
 */
function commit(staged: StagedSubmod[], installRoot: string, backupDir: string): string[] {
  const moves: Move[] = [];
  fs.mkdirSync(backupDir, { recursive: true });

  try {
    staged.forEach((sub, i) => {
      const to = path.join(installRoot, sub.relative);
      const move: Move = { from: sub.source, to, done: false };
      if (fs.existsSync(to)) {
        const backup = path.join(backupDir, String(i));
        logger.debug(`Replacing existing ${to}`);
        moveDir(to, backup);
        move.backup = backup;
      }
      moves.push(move);
      fs.mkdirSync(path.dirname(to), { recursive: true });
      logger.debug(`Temp path: ${sub.source} | Perm path: ${to}`);
      moveDir(sub.source, to);
      move.done = true;
    });
  } catch (err) {
    rollback(moves);
    throw toModkeepError(err);
  }

  return moves.map((m) => m.to);
}

async function installUnlocked(
  request: InstallRequest,
  parser: ModstringParser,
): Promise<InstallResult> {
  await runSanityCheck(request.sanityCheck, request.archive);
  const pkg = parser.parse(request.modstring);
  const author = request.author ?? pkg.author;

  const installRoot = path.resolve(request.installRoot);
  fs.mkdirSync(installRoot, { recursive: true });
  logger.debug(`Starting install of ${request.modstring} into ${installRoot}`);

  return withScratchDir(request.extractDir ?? installRoot, async (scratch) => {
    const extracted = path.join(scratch, "package");
    fs.mkdirSync(extracted);
    extractArchive(request.archive, extracted);

    const discovery = discoverSubmods(extracted);
    const staged = stage(extracted, discovery.submods, author, discovery.manifest !== undefined);
    const paths = commit(staged, installRoot, path.join(scratch, "previous"));

    const submods: SubMod[] = staged.map((s) => ({
      name: s.name,
      path: s.relative,
      disabled: false,
    }));
    logger.debug(`Installed ${submods.length} submod(s) for ${request.modstring}`);

    return {
      package: pkg,
      ...(discovery.manifest ? { manifest: discovery.manifest } : {}),
      submods,
      paths,
    };
  });
}

/**
 * Installs a package archive into `installRoot`.
 *
 * The archive is unpacked into a scratch directory; submods are found by
 * their mod.json, given the package manifest and an author file, then moved
 * into place together. Installs into the same root are serialized.
 */
export function installMod(
  request: InstallRequest,
  options: InstallOptions = {},
): Promise<InstallResult> {
  const parser = options.parser ?? new ModstringParser();
  const lock = options.lock ?? installLock;
  return lock.run(request.installRoot, () => installUnlocked(request, parser));
}

/**
 * Carries each previously disabled submod's state over to the freshly
 * installed version. Moves that fail leave the submod enabled.
 */
export function preserveDisabled(root: string, previous: SubMod[], next: SubMod[]): SubMod[] {
  const oldByName = new Map<string, SubMod>();
  for (const sub of [...previous].sort(byNameInsensitive)) {
    oldByName.set(sub.name.toLowerCase(), sub);
  }

  return [...next].sort(byNameInsensitive).map((sub) => {
    const old = oldByName.get(sub.name.toLowerCase());
    if (!old?.disabled) return sub;

    const kept: SubMod = { name: sub.name, path: old.path, disabled: true };
    const from = path.join(root, physicalPath(sub));
    const to = path.join(root, physicalPath(kept));
    try {
      if (!fs.existsSync(from)) {
        throw new Error(`${from} does not exist`);
      }
      fs.rmSync(to, { recursive: true, force: true });
      fs.mkdirSync(path.dirname(to), { recursive: true });
      logger.debug(`Moving mod from ${from} to ${to}`);
      moveDir(from, to);
      return kept;
    } catch (err) {
      logger.warn(`Unable to keep ${sub.name} disabled: ${errorMessage(err)}`);
      return sub;
    }
  });
}

/**
 * Deletes previous submod directories the new version no longer occupies.
 * Directories another recorded package claims are left alone.
 */
function removeStale(index: LocalIndex, name: string, previous: SubMod[], next: SubMod[]): void {
  const claimed = new Set(next.map((s) => index.absolutePath(s)));
  for (const other of index.listMods()) {
    if (other.name === name) continue;
    for (const sub of other.mods) claimed.add(index.absolutePath(sub));
  }

  for (const old of previous) {
    const abs = index.absolutePath(old);
    if (claimed.has(abs)) continue;
    logger.debug(`Removing stale submod directory ${abs}`);
    fs.rmSync(abs, { recursive: true, force: true });
  }
}

/**
 * Installs a package into the index's root and records it. When the package
 * is already recorded, disabled submods stay disabled and leftover
 * directories of the old version are removed.
 *
 * The whole reconcile holds the root's install lock. The index is not
 * saved; call `index.close()` when the session ends.
 */
export function updateMod(
  index: LocalIndex,
  request: Omit<InstallRequest, "installRoot">,
  options: InstallOptions = {},
): Promise<InstalledPackage> {
  const parser = options.parser ?? new ModstringParser();
  const lock = options.lock ?? installLock;

  return lock.run(index.root, async () => {
    const result = await installUnlocked({ ...request, installRoot: index.root }, parser);
    const name = result.package.name;
    const previous = index.mods.get(name);

    let mods = result.submods;
    if (previous) {
      mods = preserveDisabled(index.root, previous.mods, result.submods);
      removeStale(index, name, previous.mods, mods);
      logger.debug(`Updated ${name}: ${previous.version} → ${result.package.version}`);
    }

    const record: InstalledPackage = {
      name,
      author: request.author ?? result.package.author,
      version: result.package.version,
      mods,
      dependsOn: previous?.dependsOn ?? [],
      dependents: previous?.dependents ?? [],
    };
    index.setMod(record);
    return record;
  });
}

function removeDirTree(target: string): void {
  if (!fs.lstatSync(target).isDirectory()) {
    throw new Error(`${target} is not a directory`);
  }
  fs.rmSync(target, { recursive: true });
}

function isGone(target: string): boolean {
  try {
    fs.lstatSync(target);
    return false;
  } catch (err) {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
  }
}

/**
 * Removes each path as a directory tree, falling back to removing a single
 * file. Paths already missing count as removed. A failure is reported for
 * that path and the rest carry on.
 */
export function uninstall(paths: readonly string[]): UninstallResult[] {
  return paths.map((target) => {
    if (isGone(target)) {
      logger.debug(`${target} is already gone`);
      return { path: target, removed: true };
    }
    try {
      removeDirTree(target);
      return { path: target, removed: true };
    } catch (dirErr) {
      logger.debug(`Removing dir failed (${errorMessage(dirErr)}), attempting to remove file...`);
    }
    try {
      fs.unlinkSync(target);
      return { path: target, removed: true };
    } catch (err) {
      logger.error(`Unable to remove ${target}: ${errorMessage(err)}`);
      return { path: target, removed: false, error: errorMessage(err) };
    }
  });
}

/**
 * Removes a package's submods from disk and drops it from the index. Submods
 * that couldn't be removed stay recorded and an IoError is thrown.
 */
export function uninstallMod(index: LocalIndex, name: string): UninstallResult[] {
  const pkg = index.mods.get(name);
  if (!pkg) {
    throw new NotInstalledError(name);
  }

  const results = uninstall(pkg.mods.map((sub) => index.absolutePath(sub)));
  const failed = pkg.mods.filter((_, i) => results[i]?.removed !== true);
  if (failed.length > 0) {
    pkg.mods = failed;
    throw new IoError(
      `Unable to remove ${failed.map((s) => s.name).join(", ")} from ${name}`,
    );
  }

  index.removeMod(name);
  return results;
}

/** Moves a submod under the disabled marker. Returns false if it already was. */
export function disableSubmod(root: string, sub: SubMod): boolean {
  if (sub.disabled) return false;
  const from = path.join(root, physicalPath(sub));
  const to = path.join(root, physicalPath({ ...sub, disabled: true }));
  fs.mkdirSync(path.dirname(to), { recursive: true });
  logger.debug(`Rename mod from ${from} to ${to}`);
  fs.renameSync(from, to);
  sub.disabled = true;
  return true;
}

/** Moves a submod back out of the disabled marker. Returns false if it was enabled. */
export function enableSubmod(root: string, sub: SubMod): boolean {
  if (!sub.disabled) return false;
  const from = path.join(root, physicalPath(sub));
  const to = path.join(root, physicalPath({ ...sub, disabled: false }));
  logger.debug(`Rename mod from ${from} to ${to}`);
  fs.renameSync(from, to);
  sub.disabled = false;
  return true;
}

/**
 * Enables or disables a submod by name anywhere in the index. Returns the
 * owning package's name, or undefined if no submod has that name.
 */
export function setSubmodEnabled(
  index: LocalIndex,
  submodName: string,
  enabled: boolean,
): { packageName: string; changed: boolean } | undefined {
  const lower = submodName.toLowerCase();
  for (const pkg of index.listMods()) {
    const sub = pkg.mods.find((s) => s.name.toLowerCase() === lower);
    if (!sub) continue;
    const changed = enabled ? enableSubmod(index.root, sub) : disableSubmod(index.root, sub);
    return { packageName: pkg.name, changed };
  }
  return undefined;
}

/** Catalog packages recorded in the index at a version other than the latest. */
export function getOutdated(catalog: readonly RemotePackage[], index: LocalIndex): RemotePackage[] {
  return catalog.filter((remote) =>
    index
      .listMods()
      .some((pkg) => pkg.name.trim() === remote.name.trim() && pkg.version.trim() !== remote.latest.trim()),
  );
}

export interface PackageContext {
  index: LocalIndex;
  cache: Cache;
  catalog: RemotePackage[];
  parser: ModstringParser;
  sanityCheck?: SanityCheck;
  onProgress?: ProgressFn;
  lock?: InstallLock;
}

async function fetchArchive(ctx: PackageContext, release: RemoteVersion): Promise<Buffer> {
  const cached = ctx.cache.get(release.name, release.version);
  if (cached && fs.existsSync(cached)) {
    logger.debug(`Using cached ${release.name} ${release.version}`);
    return fs.readFileSync(cached);
  }
  const dest = ctx.cache.pathFor(release.name, release.version);
  await downloadFile(release.url, dest, ctx.onProgress);
  ctx.cache.track(dest);
  return fs.readFileSync(dest);
}

/**
 * Installs (or updates) a catalog package by name or modstring, then any of
 * its direct dependencies that aren't installed yet. Dependencies of those
 * dependencies are not followed.
 */
export async function installPackage(
  ctx: PackageContext,
  target: string,
  options: { version?: string; withDeps?: boolean } = {},
): Promise<InstalledPackage> {
  let name = target;
  let version = options.version;
  if (ctx.parser.validate(target)) {
    const parsed = ctx.parser.parse(target);
    name = parsed.name;
    version = version ?? parsed.version;
  }

  const remote = findPackage(ctx.catalog, name);
  if (!remote) {
    throw new PackageNotFoundError(name);
  }
  const release = remote.versions[version ?? remote.latest];
  if (!release) {
    throw new PackageNotFoundError(`${remote.name}@${version ?? remote.latest}`);
  }

  const deps = resolveDeps(release.deps, ctx.catalog);
  const archive = await fetchArchive(ctx, release);
  const modstring = ctx.parser.format({
    author: remote.author,
    name: remote.name,
    version: release.version,
  });

  const record = await updateMod(
    ctx.index,
    { modstring, archive, ...(ctx.sanityCheck ? { sanityCheck: ctx.sanityCheck } : {}) },
    { parser: ctx.parser, ...(ctx.lock ? { lock: ctx.lock } : {}) },
  );
  ctx.cache.clean(remote.name, release.version);
  logger.success(`Installed ${modstring}`);

  if (options.withDeps !== false) {
    for (const dep of deps) {
      if (!ctx.index.hasMod(dep.name)) {
        await installPackage(ctx, dep.name, { withDeps: false });
      }
      ctx.index.addDependencyEdge(record.name, dep.name);
    }
  }

  return record;
}

/**
 * Updates each package in turn. A failed package is logged and skipped.
 */
export async function updatePackages(
  ctx: PackageContext,
  outdated: readonly RemotePackage[],
): Promise<InstalledPackage[]> {
  const updated: InstalledPackage[] = [];
  for (const remote of outdated) {
    try {
      updated.push(await installPackage(ctx, remote.name, { withDeps: false }));
    } catch (err) {
      logger.warn(`Failed to update ${remote.name}: ${errorMessage(err)}`);
    }
  }
  return updated;
}

/**
 * Extracts the framework's own files (everything under `Northstar/`) into the
 * game directory.
 */
export function installCore(archive: Buffer, gameDir: string): ExtractSummary {
  fs.mkdirSync(gameDir, { recursive: true });
  const summary = extractPrefixed(archive, CORE_ARCHIVE_PREFIX, gameDir);
  logger.debug(`Extracted ${summary.written.length} core entries into ${gameDir}`);
  return summary;
}
