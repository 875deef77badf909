/**
 * Profile catalog loading for CLI commands
 *
 * Reads the built-in catalog shipped in data/profiles.json, merges the
 * profiles from the user's config file and builds the engine catalog.
 */

import * as fs from "fs/promises";

import { getBuiltinCatalogPath } from "@/cli/env.js";
import { debug, error } from "@/cli/logger.js";
import {
  CatalogValidationError,
  createProfileCatalog,
  mergeProfileDefinitions,
  parseProfileDefinitions,
} from "@/switcher/index.js";

import type { Config } from "@/cli/config.js";
import type {
  Profile,
  ProfileCatalog,
  ProfileDefinition,
} from "@/switcher/index.js";

/**
 * Read and validate the built-in profile definitions
 * @param args - Configuration arguments
 * @param args.catalogPath - Override for the catalog file (defaults to data/profiles.json)
 *
 * @throws CatalogValidationError if the file is not valid JSON or fails the schema
 *
 * @returns Built-in profile definitions
 */
export const readBuiltinDefinitions = async (args?: {
  catalogPath?: string | null;
}): Promise<Array<ProfileDefinition>> => {
  const catalogPath = args?.catalogPath ?? getBuiltinCatalogPath();
  const content = await fs.readFile(catalogPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new CatalogValidationError([
      `${catalogPath} is not valid JSON: ${String(err)}`,
    ]);
  }

  return parseProfileDefinitions({ definitions: parsed, source: catalogPath });
};

/**
 * Build the catalog used by every command
 * @param args - Configuration arguments
 * @param args.config - Loaded config; its profiles extend or replace built-in ones
 * @param args.catalogPath - Override for the built-in catalog file
 *
 * @throws CatalogValidationError if the merged catalog is invalid
 *
 * @returns The profile catalog
 */
export const loadProfileCatalog = async (args: {
  config: Config | null;
  catalogPath?: string | null;
}): Promise<ProfileCatalog> => {
  const { config, catalogPath } = args;
  const base = await readBuiltinDefinitions({ catalogPath });
  const overrides = config?.profiles ?? [];

  if (overrides.length > 0) {
    debug({
      message: `Merging ${overrides.length} profile(s) from ${config?.configPath ?? "config"}`,
    });
  }

  return createProfileCatalog({
    definitions: mergeProfileDefinitions({ base, overrides }),
  });
};

/**
 * Find the catalog profile for the running desktop session
 * @param args - Configuration arguments
 * @param args.catalog - Profile catalog
 * @param args.env - Environment to read XDG_CURRENT_DESKTOP from
 *
 * @returns The matching profile, or null when unset or unknown
 */
export const detectCurrentProfile = (args: {
  catalog: ProfileCatalog;
  env?: NodeJS.ProcessEnv | null;
}): Profile | null => {
  const env = args.env ?? process.env;
  const desktopNames = env.XDG_CURRENT_DESKTOP;

  if (desktopNames == null || desktopNames.trim() === "") {
    return null;
  }

  return args.catalog.detect({ desktopNames });
};

/**
 * Load the catalog for a command, exiting when it is invalid
 * @param args - Configuration arguments
 * @param args.config - Loaded config
 *
 * @returns The profile catalog
 */
export const loadProfileCatalogOrExit = async (args: {
  config: Config | null;
}): Promise<ProfileCatalog> => {
  try {
    return await loadProfileCatalog({ config: args.config });
  } catch (err) {
    if (err instanceof CatalogValidationError) {
      error({ message: err.message });
      process.exit(1);
    }
    throw err;
  }
};
