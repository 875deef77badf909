/**
 * Version lookup for the CLI banner and --version flag
 */

import { join } from "path";

import semver from "semver";

import { PACKAGE_NAME, findPackageRoot, readPackageManifest } from "@/cli/env.js";

/**
 * Get the current package version by reading package.json
 * This works for any installation method (global npm install, local node_modules)
 *
 * @param args - Optional configuration arguments
 * @param args.startDir - Directory to start searching from (defaults to current file's directory)
 *
 * @returns The current package version or null if not found or not valid semver
 */
export const getCurrentPackageVersion = (args?: {
  startDir?: string | null;
}): string | null => {
  const packageRoot = findPackageRoot({ startDir: args?.startDir });
  if (packageRoot == null) {
    return null;
  }

  const manifest = readPackageManifest({
    packageJsonPath: join(packageRoot, "package.json"),
  });
  if (manifest?.name !== PACKAGE_NAME || manifest.version == null) {
    return null;
  }

  return semver.valid(manifest.version);
};
