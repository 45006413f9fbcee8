// ── Identifiers ──

export interface Modstring {
  author: string;
  name: string;
  version: string;
}

// ── Remote catalog ──

export interface RemoteVersion {
  name: string;
  fullName: string;
  version: string;
  url: string;
  description: string;
  deps: string[];
  fileSize: number;
  installed: boolean;
}

export interface RemotePackage {
  name: string;
  author: string;
  fullName: string;
  /** Version tag of the newest release, as listed first by the catalog. */
  latest: string;
  versions: Record<string, RemoteVersion>;
  installed: boolean;
  upgradable: boolean;
  /** Catalog fields this tool doesn't model, kept as received. */
  extra: Record<string, unknown>;
}

// ── Package contents ──

export interface Manifest {
  name: string;
  version_number: string;
  website_url: string;
  description: string;
  dependencies: string[];
}

export interface ModJson {
  name: string;
  description: string;
  version: string;
  loadPriority?: number;
  extra: Record<string, unknown>;
}

export interface DiscoveredSubmod {
  name: string;
  /** Directory of the submod relative to the extraction root, e.g. `mods/Foo.Client`. */
  path: string;
  descriptor: ModJson;
}

export interface Discovery {
  manifest?: Manifest;
  submods: DiscoveredSubmod[];
}

export interface InstalledMod {
  path: string;
  disabled: boolean;
  manifest?: Manifest;
  modJson: ModJson;
  author?: string;
}

// ── Local index ──

export interface SubMod {
  name: string;
  /** Enabled location relative to the install root. */
  path: string;
  disabled: boolean;
}

export interface InstalledPackage {
  name: string;
  author: string;
  version: string;
  mods: SubMod[];
  dependsOn: string[];
  dependents: string[];
}

// ── Install ──

export type SanityCheck = (archive: Buffer) => boolean | Promise<boolean>;

export interface InstallRequest {
  /** `author-name-X.Y.Z` of the package being installed. */
  modstring: string;
  archive: Buffer;
  installRoot: string;
  /** Written to each submod's author file; defaults to the modstring's author. */
  author?: string;
  sanityCheck?: SanityCheck;
  /** Parent for the scratch directory; defaults to the install root. */
  extractDir?: string;
}

export interface InstallResult {
  package: Modstring;
  manifest?: Manifest;
  submods: SubMod[];
  paths: string[];
}

export interface UninstallResult {
  path: string;
  removed: boolean;
  error?: string;
}

// ── Cache ──

export interface CacheEntry {
  name: string;
  version: string;
  path: string;
}

// ── Config ──

export interface ModkeepConfig {
  paths?: {
    mods?: string;
    index?: string;
    cache?: string;
    game?: string;
  };
  catalog?: {
    url?: string;
    ttl?: number;
  };
}
