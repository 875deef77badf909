/**
 * Package set difference between two profiles
 */

import type { DiffResult, Profile } from "./types.js";

/**
 * Elements of `from` that are not in `without`
 * @param from - Source set
 * @param without - Set to subtract
 *
 * @returns New set
 */
const subtract = (
  from: ReadonlySet<string>,
  without: ReadonlySet<string>,
): Set<string> => {
  const result = new Set<string>();
  for (const item of from) {
    if (!without.has(item)) {
      result.add(item);
    }
  }
  return result;
};

/**
 * Compute the packages to remove and install when switching profiles
 *
 * This is plain set subtraction; dependency resolution is left to the
 * package manager when the script runs. Packages shared by both profiles
 * appear in neither set.
 *
 * @param args - Configuration arguments
 * @param args.current - Active profile
 * @param args.target - Profile to switch to
 *
 * @returns The removal and installation sets
 */
export const diffProfiles = (args: {
  current: Profile;
  target: Profile;
}): DiffResult => {
  const { current, target } = args;
  return {
    toRemove: subtract(current.packages, target.packages),
    toInstall: subtract(target.packages, current.packages),
  };
};

/**
 * Canonical order for package names in generated scripts
 * @param packages - Package set
 *
 * @returns Names sorted by code unit
 */
export const sortPackages = (packages: ReadonlySet<string>): Array<string> => {
  return Array.from(packages).sort();
};
