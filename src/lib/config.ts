import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { parse, stringify } from "yaml";
import { z } from "zod/v4";
import type { ModkeepConfig } from "../types/index.js";
import { ParseError, errorMessage } from "./errors.js";

export const DEFAULT_CATALOG_URL = "https://northstar.thunderstore.io/c/northstar/api/v1/package/";

const configSchema = z.object({
  paths: z
    .object({
      mods: z.string().optional(),
      index: z.string().optional(),
      cache: z.string().optional(),
      game: z.string().optional(),
    })
    .optional(),
  catalog: z
    .object({
      url: z.string().optional(),
      ttl: z.number().nonnegative().optional(),
    })
    .optional(),
});

export function getConfigDir(): string {
  return process.env["MODKEEP_HOME"] ?? path.join(os.homedir(), ".modkeep");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config");
}

export function readConfig(): ModkeepConfig {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) return {};

  let data: unknown;
  try {
    data = parse(fs.readFileSync(configPath, "utf-8")) ?? {};
  } catch (err) {
    throw new ParseError(configPath, errorMessage(err), err);
  }
  const result = configSchema.safeParse(data);
  if (!result.success) {
    throw new ParseError(configPath, result.error.issues.map((i) => i.message).join("; "));
  }
  return result.data;
}

export function writeConfig(config: ModkeepConfig): void {
  fs.mkdirSync(getConfigDir(), { recursive: true });
  fs.writeFileSync(getConfigPath(), stringify(config), "utf-8");
}

export function getModsDir(): string {
  return path.resolve(readConfig().paths?.mods ?? "mods");
}

export function getIndexPath(): string {
  return readConfig().paths?.index ?? path.join(getConfigDir(), "index.yaml");
}

export function getCacheDir(): string {
  return readConfig().paths?.cache ?? path.join(getConfigDir(), "cache");
}

export function getGameDir(): string | undefined {
  return readConfig().paths?.game;
}

export function getCatalogUrl(): string {
  return readConfig().catalog?.url ?? DEFAULT_CATALOG_URL;
}

export function getCatalogTTL(): number {
  return readConfig().catalog?.ttl ?? 3600;
}

const SETTABLE_KEYS = [
  "paths.mods",
  "paths.index",
  "paths.cache",
  "paths.game",
  "catalog.url",
  "catalog.ttl",
] as const;

export type ConfigKey = (typeof SETTABLE_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return SETTABLE_KEYS.some((k) => k === key);
}

export function getConfigValue(key: ConfigKey): string | number | undefined {
  const config = readConfig();
  switch (key) {
    case "paths.mods":
      return config.paths?.mods;
    case "paths.index":
      return config.paths?.index;
    case "paths.cache":
      return config.paths?.cache;
    case "paths.game":
      return config.paths?.game;
    case "catalog.url":
      return config.catalog?.url;
    case "catalog.ttl":
      return config.catalog?.ttl;
  }
}

export function setConfigValue(key: ConfigKey, value: string): void {
  const config = readConfig();
  switch (key) {
    case "paths.mods":
      config.paths = { ...config.paths, mods: value };
      break;
    case "paths.index":
      config.paths = { ...config.paths, index: value };
      break;
    case "paths.cache":
      config.paths = { ...config.paths, cache: value };
      break;
    case "paths.game":
      config.paths = { ...config.paths, game: value };
      break;
    case "catalog.url":
      config.catalog = { ...config.catalog, url: value };
      break;
    case "catalog.ttl": {
      const ttl = Number(value);
      if (!Number.isFinite(ttl) || ttl < 0) {
        throw new ParseError(key, `expected a non-negative number of seconds, got "${value}"`);
      }
      config.catalog = { ...config.catalog, ttl };
      break;
    }
  }
  writeConfig(config);
}

export { SETTABLE_KEYS };
