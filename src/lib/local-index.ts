import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { parse, stringify } from "yaml";
import { z } from "zod/v4";
import type { InstalledPackage, SubMod } from "../types/index.js";
import { MissingFileError, MissingPathError, ParseError, errorMessage } from "./errors.js";
import { DISABLED_DIR } from "./discovery.js";
import { logger } from "./logger.js";

const INDEX_VERSION = 1;

const subModSchema = z.object({
  name: z.string(),
  path: z.string(),
  disabled: z.boolean().default(false),
});

const packageSchema = z.object({
  author: z.string().default(""),
  version: z.string(),
  mods: z.array(subModSchema).default([]),
  depends_on: z.array(z.string()).default([]),
  dependents: z.array(z.string()).default([]),
});

const indexSchema = z.object({
  index_version: z.number().default(INDEX_VERSION),
  root: z.string().optional(),
  mods: z.record(z.string(), packageSchema).default({}),
  linked: z.record(z.string(), packageSchema).default({}),
});

type StoredPackage = z.infer<typeof packageSchema>;

function fromStored(name: string, stored: StoredPackage): InstalledPackage {
  return {
    name,
    author: stored.author,
    version: stored.version,
    mods: stored.mods.map((m) => ({ ...m })),
    dependsOn: [...stored.depends_on],
    dependents: [...stored.dependents],
  };
}

function toStored(pkg: InstalledPackage): StoredPackage {
  return {
    author: pkg.author,
    version: pkg.version,
    mods: pkg.mods.map((m) => ({ name: m.name, path: m.path, disabled: m.disabled })),
    depends_on: [...pkg.dependsOn].sort(),
    dependents: [...pkg.dependents].sort(),
  };
}

function mapValues(
  packages: Map<string, InstalledPackage>,
): Record<string, StoredPackage> {
  const out: Record<string, StoredPackage> = {};
  for (const [name, pkg] of packages) out[name] = toStored(pkg);
  return out;
}

function hashOf(text: string): string {
  return `sha256:${crypto.createHash("sha256").update(text).digest("hex")}`;
}

/** Where a submod sits on disk, relative to the install root. */
export function physicalPath(sub: SubMod): string {
  return sub.disabled ? path.join(DISABLED_DIR, sub.path) : sub.path;
}

/**
 * Record of installed packages, persisted as YAML.
 *
 * Changes are only written by `save`, `saveIfChanged` or `close`; a session
 * that mutates the index must end with one of them.
 */
export class LocalIndex {
  readonly mods = new Map<string, InstalledPackage>();
  readonly linked = new Map<string, InstalledPackage>();
  private loadedHash = "";

  constructor(
    public root: string,
    public filePath?: string,
  ) {}

  static load(filePath: string): LocalIndex {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new MissingFileError(filePath);
      }
      throw err;
    }

    let data: unknown;
    try {
      data = parse(raw) ?? {};
    } catch (err) {
      throw new ParseError(filePath, errorMessage(err), err);
    }
    const result = indexSchema.safeParse(data);
    if (!result.success) {
      throw new ParseError(filePath, result.error.issues.map((i) => i.message).join("; "));
    }

    const index = new LocalIndex(result.data.root ?? path.dirname(filePath), filePath);
    for (const [name, stored] of Object.entries(result.data.mods)) {
      index.mods.set(name, fromStored(name, stored));
    }
    for (const [name, stored] of Object.entries(result.data.linked)) {
      index.linked.set(name, fromStored(name, stored));
    }
    index.loadedHash = index.hash();
    return index;
  }

  /** Loads the index, or creates and saves an empty one when the file is absent. */
  static loadOrCreate(filePath: string, root: string = path.dirname(filePath)): LocalIndex {
    try {
      return LocalIndex.load(filePath);
    } catch (err) {
      if (!(err instanceof MissingFileError)) throw err;
    }
    logger.debug(`Creating local index at ${filePath}`);
    const index = new LocalIndex(root, filePath);
    index.save();
    return index;
  }

  serialize(): string {
    return stringify(
      {
        index_version: INDEX_VERSION,
        root: this.root,
        mods: mapValues(this.mods),
        linked: mapValues(this.linked),
      },
      { sortMapEntries: true },
    );
  }

  hash(): string {
    return hashOf(this.serialize());
  }

  /** Writes the index beside its target, then renames it into place. */
  save(): void {
    if (!this.filePath) {
      throw new MissingPathError("the local index");
    }
    const text = this.serialize();
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempFile = `${this.filePath}.tmp-${process.pid}`;
    fs.writeFileSync(tempFile, text, "utf-8");
    fs.renameSync(tempFile, this.filePath);
    this.loadedHash = hashOf(text);
    logger.debug(`Wrote local index to ${this.filePath}`);
  }

  saveWithPath(filePath: string): void {
    this.filePath = filePath;
    this.save();
  }

  /** Returns whether a write happened. */
  saveIfChanged(): boolean {
    if (this.hash() === this.loadedHash) return false;
    this.save();
    return true;
  }

  close(): boolean {
    return this.saveIfChanged();
  }

  getMod(name: string): InstalledPackage | undefined {
    return this.mods.get(name) ?? this.linked.get(name);
  }

  hasMod(name: string): boolean {
    return this.getMod(name) !== undefined;
  }

  listMods(): InstalledPackage[] {
    return [...this.mods.values()];
  }

  setMod(pkg: InstalledPackage): void {
    this.mods.set(pkg.name, pkg);
  }

  linkMod(pkg: InstalledPackage): void {
    this.linked.set(pkg.name, pkg);
  }

  unlinkMod(name: string): InstalledPackage | undefined {
    const pkg = this.linked.get(name);
    this.linked.delete(name);
    return pkg;
  }

  /** Drops a package and every dependency edge that points at it. */
  removeMod(name: string): InstalledPackage | undefined {
    const pkg = this.mods.get(name);
    if (!pkg) return undefined;
    this.mods.delete(name);
    for (const other of [...this.mods.values(), ...this.linked.values()]) {
      other.dependents = other.dependents.filter((d) => d !== name);
      other.dependsOn = other.dependsOn.filter((d) => d !== name);
    }
    return pkg;
  }

  addDependencyEdge(dependent: string, dependency: string): void {
    const from = this.getMod(dependent);
    const to = this.getMod(dependency);
    if (from && !from.dependsOn.includes(dependency)) from.dependsOn.push(dependency);
    if (to && !to.dependents.includes(dependent)) to.dependents.push(dependent);
  }

  absolutePath(sub: SubMod): string {
    return path.join(this.root, physicalPath(sub));
  }

  /** Submod locations the index records that are missing on disk. */
  verify(): string[] {
    const missing: string[] = [];
    for (const pkg of [...this.mods.values(), ...this.linked.values()]) {
      for (const sub of pkg.mods) {
        const abs = this.absolutePath(sub);
        if (!fs.existsSync(abs)) missing.push(abs);
      }
    }
    return missing;
  }
}
