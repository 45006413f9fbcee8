export enum ErrorCodes {
  INVALID_NAME = "INVALID_NAME",
  NO_MOD_DIRECTORY = "NO_MOD_DIRECTORY",
  SANITY_FAILED = "SANITY_FAILED",
  DEPENDENCY_ERROR = "DEPENDENCY_ERROR",
  MISSING_FILE = "MISSING_FILE",
  MISSING_PATH = "MISSING_PATH",
  ARCHIVE_ERROR = "ARCHIVE_ERROR",
  PATH_PREFIX_ERROR = "PATH_PREFIX_ERROR",
  IO_ERROR = "IO_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
  NOT_INSTALLED = "NOT_INSTALLED",
  PACKAGE_NOT_FOUND = "PACKAGE_NOT_FOUND",
}

export class ModkeepError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCodes,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModkeepError";
    this.code = code;
    this.details = details;
  }
}

export class InvalidNameError extends ModkeepError {
  constructor(public readonly input: string) {
    super(`Invalid mod name "${input}": expected author-name-X.Y.Z`, ErrorCodes.INVALID_NAME, {
      input,
    });
    this.name = "InvalidNameError";
  }
}

export class NoModDirectoryError extends ModkeepError {
  constructor(source: string) {
    super(`Couldn't find a mod directory to install in ${source}`, ErrorCodes.NO_MOD_DIRECTORY, {
      source,
    });
    this.name = "NoModDirectoryError";
  }
}

export class SanityFailedError extends ModkeepError {
  constructor(reason: string, cause?: unknown) {
    super(`Sanity check failed: ${reason}`, ErrorCodes.SANITY_FAILED, undefined, { cause });
    this.name = "SanityFailedError";
  }
}

export class DependencyError extends ModkeepError {
  constructor(public readonly dependency: string) {
    super(`Error resolving dependency ${dependency}`, ErrorCodes.DEPENDENCY_ERROR, {
      dependency,
    });
    this.name = "DependencyError";
  }
}

export class MissingFileError extends ModkeepError {
  constructor(public readonly path: string) {
    super(`No such file ${path}`, ErrorCodes.MISSING_FILE, { path });
    this.name = "MissingFileError";
  }
}

export class MissingPathError extends ModkeepError {
  constructor(what: string) {
    super(`Attempted to save ${what} but it has no path`, ErrorCodes.MISSING_PATH);
    this.name = "MissingPathError";
  }
}

export class ArchiveError extends ModkeepError {
  constructor(message: string, cause?: unknown) {
    super(`Unreadable archive: ${message}`, ErrorCodes.ARCHIVE_ERROR, undefined, { cause });
    this.name = "ArchiveError";
  }
}

export class PathPrefixError extends ModkeepError {
  constructor(path: string, prefix: string) {
    super(
      `Error stripping directory prefix "${prefix}" from ${path}. Is the mod formatted correctly?`,
      ErrorCodes.PATH_PREFIX_ERROR,
      { path, prefix },
    );
    this.name = "PathPrefixError";
  }
}

export class IoError extends ModkeepError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCodes.IO_ERROR, undefined, { cause });
    this.name = "IoError";
  }
}

export class NetworkError extends ModkeepError {
  constructor(
    url: string,
    public readonly status: number,
    statusText = "",
  ) {
    super(
      `Request to ${url} failed: ${status}${statusText ? ` ${statusText}` : ""}`,
      ErrorCodes.NETWORK_ERROR,
      { url, status },
    );
    this.name = "NetworkError";
  }
}

export class ParseError extends ModkeepError {
  constructor(what: string, reason: string, cause?: unknown) {
    super(`Error parsing ${what}: ${reason}`, ErrorCodes.PARSE_ERROR, { what }, { cause });
    this.name = "ParseError";
  }
}

export class NotInstalledError extends ModkeepError {
  constructor(packageName: string) {
    super(`Package '${packageName}' is not installed.`, ErrorCodes.NOT_INSTALLED, {
      packageName,
    });
    this.name = "NotInstalledError";
  }
}

export class PackageNotFoundError extends ModkeepError {
  constructor(packageName: string) {
    super(
      `Package '${packageName}' not found in the catalog. Run \`modkeep search <query>\` to find packages.`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName },
    );
    this.name = "PackageNotFoundError";
  }
}

function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Normalizes anything thrown into a ModkeepError. Node system errors become IoError.
 */
export function toModkeepError(err: unknown): ModkeepError {
  if (err instanceof ModkeepError) return err;
  if (isSystemError(err)) return new IoError(err.message, err);
  if (err instanceof Error) {
    return new ModkeepError(err.message, ErrorCodes.IO_ERROR, undefined, { cause: err });
  }
  return new ModkeepError(String(err), ErrorCodes.IO_ERROR);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
