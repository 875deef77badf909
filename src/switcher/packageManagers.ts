/**
 * Package manager adapters
 *
 * Maps each supported front end to the command lines that remove and
 * install a package list without prompting.
 */

import { UnsupportedPackageManagerError } from "./errors.js";
import { PACKAGE_MANAGER_KINDS } from "./types.js";

import type { PackageManagerKind, Result } from "./types.js";

/**
 * Renders a package list as one command line, or null when there is nothing to do
 */
export type CommandTemplate = (packages: ReadonlyArray<string>) => string | null;

export type PackageManagerCommands = {
  kind: PackageManagerKind;
  removeTemplate: CommandTemplate;
  installTemplate: CommandTemplate;
};

/**
 * Build a template from a fixed command prefix
 * @param args - Configuration arguments
 * @param args.prefix - Command and flags placed before the package names
 *
 * @returns Template that skips empty lists
 */
const templateFor = (args: { prefix: string }): CommandTemplate => {
  const { prefix } = args;
  return (packages) => {
    if (packages.length === 0) {
      return null;
    }
    return `${prefix} ${packages.join(" ")}`;
  };
};

/**
 * Type guard for package manager kinds
 * @param value - Raw value, e.g. from a CLI flag
 *
 * @returns True if the value names a supported package manager
 */
export const isPackageManagerKind = (
  value: string,
): value is PackageManagerKind => {
  return PACKAGE_MANAGER_KINDS.some((kind) => kind === value);
};

/**
 * Get the remove/install templates for a package manager
 *
 * pacman needs root; the AUR helpers refuse to run as root and call sudo
 * themselves.
 *
 * @param args - Configuration arguments
 * @param args.kind - Package manager name
 *
 * @returns The command templates, or an UnsupportedPackageManagerError
 */
export const commandsFor = (args: {
  kind: string;
}): Result<PackageManagerCommands, UnsupportedPackageManagerError> => {
  const { kind } = args;

  if (!isPackageManagerKind(kind)) {
    return {
      ok: false,
      error: new UnsupportedPackageManagerError(kind, PACKAGE_MANAGER_KINDS),
    };
  }

  switch (kind) {
    case "pacman":
      return {
        ok: true,
        value: {
          kind,
          removeTemplate: templateFor({
            prefix: "sudo pacman -Rns --noconfirm",
          }),
          installTemplate: templateFor({
            prefix: "sudo pacman -S --needed --noconfirm",
          }),
        },
      };
    case "yay":
      return {
        ok: true,
        value: {
          kind,
          removeTemplate: templateFor({ prefix: "yay -Rns --noconfirm" }),
          installTemplate: templateFor({
            prefix:
              "yay -S --needed --noconfirm --answerclean None --answerdiff None",
          }),
        },
      };
    case "paru":
      return {
        ok: true,
        value: {
          kind,
          removeTemplate: templateFor({ prefix: "paru -Rns --noconfirm" }),
          installTemplate: templateFor({
            prefix: "paru -S --needed --noconfirm --skipreview",
          }),
        },
      };
    default: {
      const unreachable: never = kind;
      return {
        ok: false,
        error: new UnsupportedPackageManagerError(
          unreachable,
          PACKAGE_MANAGER_KINDS,
        ),
      };
    }
  }
};
