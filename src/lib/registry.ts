import fs from "node:fs";
import path from "node:path";
import { z } from "zod/v4";
import type { RemotePackage, RemoteVersion } from "../types/index.js";
import { getCacheDir, getCatalogTTL, getCatalogUrl } from "./config.js";
import { NetworkError, ParseError } from "./errors.js";
import type { LocalIndex } from "./local-index.js";
import { logger } from "./logger.js";
import { splitExtra } from "./manifest.js";

const INDEX_CACHE_FILE = "catalog.json";

const versionSchema = z.object({
  full_name: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
  description: z.string().default(""),
  download_url: z.string(),
  file_size: z.number().nonnegative().default(0),
  version_number: z.string(),
});

const listingSchema = z.looseObject({
  name: z.string(),
  owner: z.string(),
  full_name: z.string().optional(),
  versions: z.array(versionSchema).min(1),
});

const catalogSchema = z.array(listingSchema);

type Listing = z.infer<typeof listingSchema>;

const LISTING_KEYS = new Set(["name", "owner", "full_name", "versions"]);

export interface FetchIndexOptions {
  url?: string;
  cacheDir?: string;
  /** Seconds a cached copy stays fresh; 0 always refetches. */
  ttl?: number;
}

function getHeaders(): Record<string, string> {
  return {
    Accept: "application/json",
    "User-Agent": "modkeep-cli",
  };
}

function mapListing(listing: Listing): RemotePackage {
  const versions: Record<string, RemoteVersion> = {};
  for (const v of listing.versions) {
    versions[v.version_number] = {
      name: listing.name,
      fullName: v.full_name ?? `${listing.owner}-${listing.name}-${v.version_number}`,
      version: v.version_number,
      url: v.download_url,
      description: v.description,
      deps: v.dependencies,
      fileSize: v.file_size,
      installed: false,
    };
  }

  // The catalog lists newest first.
  const latest = listing.versions[0]?.version_number ?? "";
  return {
    name: listing.name,
    author: listing.owner,
    fullName: listing.full_name ?? `${listing.owner}-${listing.name}`,
    latest,
    versions,
    installed: false,
    upgradable: false,
    extra: splitExtra(listing, LISTING_KEYS),
  };
}

export function parseCatalog(data: unknown, source = "catalog"): RemotePackage[] {
  const result = catalogSchema.safeParse(data);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ParseError(source, first ? `${first.path.join(".")}: ${first.message}` : "invalid");
  }
  return result.data.map(mapListing);
}

function readCached(cachePath: string, ttl: number): unknown {
  try {
    const stat = fs.statSync(cachePath);
    const ageSeconds = (Date.now() - stat.mtimeMs) / 1000;
    if (ageSeconds < ttl) {
      return JSON.parse(fs.readFileSync(cachePath, "utf-8"));
    }
  } catch {
    logger.debug(`No usable cached catalog at ${cachePath}`);
  }
  return undefined;
}

/**
 * Fetches the package catalog, reusing a copy on disk younger than `ttl` seconds.
 */
export async function fetchIndex(options: FetchIndexOptions = {}): Promise<RemotePackage[]> {
  const url = options.url ?? getCatalogUrl();
  const cacheDir = options.cacheDir ?? getCacheDir();
  const ttl = options.ttl ?? getCatalogTTL();
  const cachePath = path.join(cacheDir, INDEX_CACHE_FILE);

  const cached = ttl > 0 ? readCached(cachePath, ttl) : undefined;
  if (cached !== undefined) {
    logger.debug("Using cached catalog");
    return parseCatalog(cached, cachePath);
  }

  const response = await fetch(url, { headers: getHeaders() });
  if (!response.ok) {
    throw new NetworkError(url, response.status, response.statusText);
  }
  const data: unknown = await response.json();
  const catalog = parseCatalog(data, url);

  fs.mkdirSync(cacheDir, { recursive: true });
  fs.writeFileSync(cachePath, JSON.stringify(data), "utf-8");

  return catalog;
}

/**
 * Flags catalog entries (and versions) recorded in the given indexes.
 * `global` entries count as installed too.
 */
export function markInstalled(
  catalog: RemotePackage[],
  local?: LocalIndex,
  global?: LocalIndex,
): RemotePackage[] {
  for (const pkg of catalog) {
    for (const index of [local, global]) {
      const installed = index?.getMod(pkg.name);
      if (!installed) continue;
      pkg.installed = true;
      const version = pkg.versions[installed.version];
      if (version) version.installed = true;
      if (installed.version.trim() !== pkg.latest.trim()) pkg.upgradable = true;
    }
  }
  return catalog;
}

export function findPackage(catalog: readonly RemotePackage[], name: string): RemotePackage | undefined {
  const lower = name.toLowerCase();
  return (
    catalog.find((p) => p.name === name) ??
    catalog.find((p) => p.name.toLowerCase() === lower || p.fullName.toLowerCase() === lower)
  );
}

export function searchPackages(catalog: readonly RemotePackage[], query: string): RemotePackage[] {
  const q = query.toLowerCase();
  return catalog.filter((pkg) => {
    const description = pkg.versions[pkg.latest]?.description ?? "";
    return [pkg.name, pkg.author, description].join(" ").toLowerCase().includes(q);
  });
}

export function fileSizeString(bytes: number): string {
  if (bytes >= 1_000_000) {
    return `${(bytes / 1_048_576).toFixed(2)} MB`;
  }
  return `${(bytes / 1024).toFixed(2)} KB`;
}
