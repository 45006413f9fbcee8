import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod/v4";
import { MissingFileError, MissingPathError, ParseError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

export const ENABLED_MODS_FILE = "enabledmods.json";

export const CORE_KEYS = {
  client: "Northstar.Client",
  custom: "Northstar.Custom",
  servers: "Northstar.CustomServers",
} as const;

const CORE_KEY_SET = new Set<string>(Object.values(CORE_KEYS));

const documentSchema = z.record(z.string(), z.unknown());

/**
 * enabledmods.json: which submods the game loads. Absent entries are enabled.
 */
export class EnabledMods {
  client = true;
  custom = true;
  servers = true;
  readonly mods = new Map<string, boolean>();
  /** Non-boolean keys found in the file, written back untouched. */
  readonly extra = new Map<string, unknown>();
  private loadedHash: string;

  constructor(public filePath?: string) {
    this.loadedHash = filePath ? "" : this.hash();
  }

  static load(filePath: string): EnabledMods {
    if (!fs.existsSync(filePath)) {
      throw new MissingFileError(filePath);
    }
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new ParseError(filePath, errorMessage(err), err);
    }
    const result = documentSchema.safeParse(data);
    if (!result.success) {
      throw new ParseError(filePath, "expected a JSON object");
    }

    const enabled = new EnabledMods(filePath);
    for (const [key, value] of Object.entries(result.data)) {
      if (typeof value !== "boolean") {
        enabled.extra.set(key, value);
      } else if (key === CORE_KEYS.client) {
        enabled.client = value;
      } else if (key === CORE_KEYS.custom) {
        enabled.custom = value;
      } else if (key === CORE_KEYS.servers) {
        enabled.servers = value;
      } else {
        enabled.mods.set(key, value);
      }
    }
    enabled.loadedHash = enabled.hash();
    return enabled;
  }

  /** Loads the file, or starts from defaults bound to `filePath` when it's absent. */
  static loadOrDefault(filePath: string): EnabledMods {
    if (!fs.existsSync(filePath)) return new EnabledMods(filePath);
    return EnabledMods.load(filePath);
  }

  isEnabled(name: string): boolean {
    switch (name) {
      case CORE_KEYS.client:
        return this.client;
      case CORE_KEYS.custom:
        return this.custom;
      case CORE_KEYS.servers:
        return this.servers;
      default:
        return this.mods.get(name) ?? true;
    }
  }

  set(name: string, enabled: boolean): void {
    switch (name) {
      case CORE_KEYS.client:
        this.client = enabled;
        break;
      case CORE_KEYS.custom:
        this.custom = enabled;
        break;
      case CORE_KEYS.servers:
        this.servers = enabled;
        break;
      default:
        this.extra.delete(name);
        this.mods.set(name, enabled);
    }
  }

  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {
      [CORE_KEYS.client]: this.client,
      [CORE_KEYS.custom]: this.custom,
      [CORE_KEYS.servers]: this.servers,
    };
    for (const name of [...this.mods.keys()].sort()) {
      if (!CORE_KEY_SET.has(name)) out[name] = this.mods.get(name);
    }
    for (const [key, value] of this.extra) {
      if (!(key in out)) out[key] = value;
    }
    return out;
  }

  hash(): string {
    return crypto.createHash("sha256").update(JSON.stringify(this.toJSON())).digest("hex");
  }

  save(): void {
    if (!this.filePath) {
      throw new MissingPathError(ENABLED_MODS_FILE);
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, `${JSON.stringify(this.toJSON(), null, 2)}\n`, "utf-8");
    this.loadedHash = this.hash();
    logger.debug(`Wrote ${this.filePath}`);
  }

  saveAs(filePath: string): void {
    this.filePath = filePath;
    this.save();
  }

  /** Writes the file when its contents differ from what was loaded. Returns whether it wrote. */
  saveIfChanged(): boolean {
    if (!this.filePath || this.hash() === this.loadedHash) return false;
    this.save();
    return true;
  }

  close(): boolean {
    return this.saveIfChanged();
  }
}

/**
 * Loads the enabledmods.json that sits beside a mods directory.
 */
export function getEnabledMods(modsDir: string): EnabledMods {
  return EnabledMods.load(path.join(path.dirname(path.resolve(modsDir)), ENABLED_MODS_FILE));
}
