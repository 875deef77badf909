/**
 * Shared types for the desktop switch engine
 */

/**
 * Profile definition as it appears in data/profiles.json and in the
 * `profiles` array of the config file
 */
export type ProfileDefinition = {
  id: string;
  label: string;
  packages: Array<string>;
  displayManager?: string | null;
  desktopNames?: Array<string> | null;
};

/**
 * A desktop environment or window manager known to the catalog
 */
export type Profile = {
  /** Stable key, e.g., "kde-plasma" */
  readonly id: string;
  /** Human-readable name, e.g., "KDE Plasma" */
  readonly label: string;
  readonly packages: ReadonlySet<string>;
  /** systemd service of the login screen, null for profiles started from a TTY */
  readonly displayManager: string | null;
  /** XDG_CURRENT_DESKTOP tokens that identify this profile */
  readonly desktopNames: ReadonlyArray<string>;
};

export const PACKAGE_MANAGER_KINDS = ["pacman", "yay", "paru"] as const;

export type PackageManagerKind = (typeof PACKAGE_MANAGER_KINDS)[number];

/**
 * Packages to remove and install when moving between two profiles
 */
export type DiffResult = {
  toRemove: ReadonlySet<string>;
  toInstall: ReadonlySet<string>;
};

export type DisplayManagerTransition = {
  disable: string | null;
  enable: string | null;
};

export type ScriptSectionKind =
  | "header"
  | "remove"
  | "install"
  | "display-manager"
  | "reboot";

export type ScriptSection = {
  kind: ScriptSectionKind;
  lines: ReadonlyArray<string>;
};

/**
 * Script text produced by a single composition request
 */
export type GeneratedScript = {
  fileName: string;
  sections: ReadonlyArray<ScriptSection>;
  text: string;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
