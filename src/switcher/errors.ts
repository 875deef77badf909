/**
 * Error types for the desktop switch engine
 *
 * Lookup and composition failures are returned inside Result values.
 * Catalog and writer failures are thrown.
 */

export type SwitcherErrorCode =
  | "PROFILE_NOT_FOUND"
  | "UNSUPPORTED_PACKAGE_MANAGER"
  | "CATALOG_INVALID"
  | "SCRIPT_EXISTS";

/**
 * Base class for errors raised by desktop-switcher
 */
export class SwitcherError extends Error {
  readonly code: SwitcherErrorCode;

  constructor(message: string, code: SwitcherErrorCode) {
    super(message);
    this.name = "SwitcherError";
    this.code = code;
  }
}

/**
 * A profile id that is not present in the catalog
 */
export class ProfileNotFoundError extends SwitcherError {
  readonly profileId: string;
  readonly available: ReadonlyArray<string>;

  constructor(profileId: string, available: ReadonlyArray<string>) {
    super(
      `Unknown profile '${profileId}'. Available profiles: ${available.join(", ")}`,
      "PROFILE_NOT_FOUND",
    );
    this.name = "ProfileNotFoundError";
    this.profileId = profileId;
    this.available = available;
  }
}

/**
 * A package manager kind without adapter commands
 */
export class UnsupportedPackageManagerError extends SwitcherError {
  readonly kind: string;
  readonly supported: ReadonlyArray<string>;

  constructor(kind: string, supported: ReadonlyArray<string>) {
    super(
      `Unsupported package manager '${kind}'. Supported: ${supported.join(", ")}`,
      "UNSUPPORTED_PACKAGE_MANAGER",
    );
    this.name = "UnsupportedPackageManagerError";
    this.kind = kind;
    this.supported = supported;
  }
}

export type ComposeError = ProfileNotFoundError | UnsupportedPackageManagerError;

/**
 * Profile definitions that fail schema validation or reuse an id
 */
export class CatalogValidationError extends SwitcherError {
  readonly problems: ReadonlyArray<string>;

  constructor(problems: ReadonlyArray<string>) {
    super(
      `Invalid profile catalog:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
      "CATALOG_INVALID",
    );
    this.name = "CatalogValidationError";
    this.problems = problems;
  }
}

/**
 * Output path already exists and overwriting was not requested
 */
export class ScriptExistsError extends SwitcherError {
  readonly path: string;

  constructor(path: string) {
    super(
      `${path} already exists. Use --force to overwrite it.`,
      "SCRIPT_EXISTS",
    );
    this.name = "ScriptExistsError";
    this.path = path;
  }
}
