/**
 * Environment paths and constants for CLI
 * Locates the package root so bundled data files can be read from both
 * the TypeScript sources and the compiled dist/ tree.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const PACKAGE_NAME = "desktop-switcher";

/**
 * Name and version fields of a package.json file
 */
export type PackageManifest = {
  name: string | null;
  version: string | null;
};

/**
 * Read the name and version from a package.json file
 * @param args - Configuration arguments
 * @param args.packageJsonPath - Path to package.json
 *
 * @returns The manifest fields, or null if the file is missing or not JSON
 */
export const readPackageManifest = (args: {
  packageJsonPath: string;
}): PackageManifest | null => {
  const { packageJsonPath } = args;
  if (!fs.existsSync(packageJsonPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  } catch {
    // Invalid JSON is treated like a missing file
    return null;
  }

  if (parsed == null || typeof parsed !== "object") {
    return null;
  }

  const name = "name" in parsed ? parsed.name : null;
  const version = "version" in parsed ? parsed.version : null;
  return {
    name: typeof name === "string" ? name : null,
    version: typeof version === "string" ? version : null,
  };
};

/**
 * Find the package root by walking up from the start directory
 * looking for package.json with name "desktop-switcher"
 *
 * @param args - Configuration arguments
 * @param args.startDir - Directory to start searching from
 *
 * @returns The path to the package root directory or null if not found
 */
export const findPackageRoot = (args?: {
  startDir?: string | null;
}): string | null => {
  let currentDir = path.resolve(args?.startDir ?? __dirname);
  const root = path.parse(currentDir).root;
  const maxDepth = 10;
  let depth = 0;

  while (currentDir !== root && depth < maxDepth) {
    const manifest = readPackageManifest({
      packageJsonPath: path.join(currentDir, "package.json"),
    });
    if (manifest?.name === PACKAGE_NAME) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
    depth++;
  }

  return null;
};

/**
 * Path of the built-in profile catalog
 *
 * @throws Error if the package root cannot be found
 *
 * @returns Absolute path to data/profiles.json
 */
export const getBuiltinCatalogPath = (): string => {
  const packageRoot = findPackageRoot();
  if (packageRoot == null) {
    throw new Error(
      `Could not find the ${PACKAGE_NAME} package root starting from ${__dirname}.`,
    );
  }
  return path.join(packageRoot, "data", "profiles.json");
};
