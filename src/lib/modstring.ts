import type { Modstring } from "../types/index.js";
import { InvalidNameError } from "./errors.js";

/**
 * Parses and validates `author-name-X.Y.Z` identifiers.
 *
 * Build one where the program starts and hand it to whatever needs it.
 */
export class ModstringParser {
  private readonly pattern = /^(\w+)-(\w+)-(\d+\.\d+\.\d+)$/;

  parse(input: string): Modstring {
    const match = this.pattern.exec(input);
    if (!match) {
      throw new InvalidNameError(input);
    }
    const [, author, name, version] = match;
    if (!author || !name || !version) {
      throw new InvalidNameError(input);
    }
    return { author, name, version };
  }

  validate(input: string): boolean {
    return this.pattern.test(input);
  }

  format(mod: Modstring, separator = "-"): string {
    return [mod.author, mod.name, mod.version].join(separator);
  }

  /** Directory name a package is known by on disk. */
  dirName(mod: Modstring): string {
    return this.format(mod);
  }

  cacheFileName(name: string, version: string): string {
    return `${name}_${version}.zip`;
  }
}
