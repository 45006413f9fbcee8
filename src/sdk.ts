export * from "./types/index.js";
export * from "./lib/errors.js";
export { ModstringParser } from "./lib/modstring.js";
export {
  openArchive,
  extractArchive,
  extractPrefixed,
  withScratchDir,
  withScratchDirSync,
  type ArchiveEntry,
  type ExtractSummary,
} from "./lib/archive.js";
export { discoverSubmods, findMods, DISABLED_DIR, MODS_FOLDER } from "./lib/discovery.js";
export {
  parseManifest,
  readManifest,
  parseModJson,
  readModJson,
  writeModJson,
  AUTHOR_FILE,
  MANIFEST_FILE,
  MOD_JSON_FILE,
} from "./lib/manifest.js";
export { LocalIndex, physicalPath } from "./lib/local-index.js";
export { Cache, clearCache, parseCacheName } from "./lib/cache.js";
export { EnabledMods, getEnabledMods, CORE_KEYS } from "./lib/enabled-mods.js";
export { resolveDeps, parseDepString, CORE_PACKAGE } from "./lib/resolver.js";
export {
  fetchIndex,
  parseCatalog,
  markInstalled,
  findPackage,
  searchPackages,
  fileSizeString,
} from "./lib/registry.js";
export { download, downloadFile, type ProgressFn } from "./lib/download.js";
export { InstallLock } from "./lib/lock.js";
export {
  installMod,
  updateMod,
  uninstall,
  uninstallMod,
  enableSubmod,
  disableSubmod,
  setSubmodEnabled,
  getOutdated,
  installPackage,
  updatePackages,
  installCore,
  permanentPath,
  preserveDisabled,
  type PackageContext,
  type InstallOptions,
} from "./lib/installer.js";
export {
  readConfig,
  writeConfig,
  getConfigValue,
  setConfigValue,
  isConfigKey,
  type ConfigKey,
} from "./lib/config.js";
export { logger } from "./lib/logger.js";
