import type { RemotePackage } from "../types/index.js";
import { DependencyError } from "./errors.js";

/** The modding framework every package implicitly depends on. */
export const CORE_PACKAGE = "Northstar";

export function isCorePackage(name: string): boolean {
  return name.toLowerCase() === CORE_PACKAGE.toLowerCase();
}

/**
 * Splits `owner-name-version` into its parts. Only the name is required;
 * throws DependencyError when there isn't one.
 */
export function parseDepString(dep: string): { owner: string; name: string; version?: string } {
  const [owner, name, ...rest] = dep.split("-");
  if (owner === undefined || name === undefined || name === "") {
    throw new DependencyError(dep);
  }
  const version = rest.join("-");
  return version ? { owner, name, version } : { owner, name };
}

/**
 * Looks up each dependency string in a catalog snapshot.
 *
 * Dependencies on the framework itself are dropped. Any other dependency
 * missing from the catalog fails the whole call.
 */
export function resolveDeps(deps: readonly string[], catalog: readonly RemotePackage[]): RemotePackage[] {
  const resolved: RemotePackage[] = [];
  for (const dep of deps) {
    const { name } = parseDepString(dep);
    if (isCorePackage(name)) continue;

    const pkg = catalog.find((p) => p.name === name);
    if (!pkg) {
      throw new DependencyError(dep);
    }
    resolved.push(pkg);
  }
  return resolved;
}
