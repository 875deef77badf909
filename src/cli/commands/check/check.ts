/**
 * Check command implementation
 *
 * Validates the config file and the merged profile catalog
 */

import { loadProfileCatalog } from "@/cli/catalog.js";
import { getGlobalOptions } from "@/cli/commands/globalOptions.js";
import { getConfigPath, loadConfig, validateConfig } from "@/cli/config.js";
import { error, success, info, newline, raw } from "@/cli/logger.js";
import { CatalogValidationError } from "@/switcher/index.js";

import type { Command } from "commander";

/**
 * Register the 'check' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerCheckCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("check")
    .description("Validate the config file and the profile catalog")
    .action(async () => {
      const { configPath } = getGlobalOptions({ program });
      await checkMain({ configPath });
    });
};

/**
 * Run validation checks on config and catalog
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path (optional)
 */
export const checkMain = async (args?: {
  configPath?: string | null;
}): Promise<void> => {
  const configPath = getConfigPath({ configPath: args?.configPath });

  newline();
  info({ message: "Running desktop-switcher checks..." });
  newline();

  let hasErrors = false;

  // Check config
  info({ message: `Checking configuration (${configPath})...` });
  const configResult = await validateConfig({ configPath });
  if (configResult.valid) {
    success({ message: `   ✓ ${configResult.message}` });
  } else {
    error({ message: `   ✗ ${configResult.message}` });
    if (configResult.errors) {
      for (const err of configResult.errors) {
        info({ message: `     - ${err}` });
      }
    }
    hasErrors = true;
  }
  newline();

  // Check catalog, including profiles from a valid config
  info({ message: "Checking profile catalog..." });
  const config = configResult.valid ? await loadConfig({ configPath }) : null;
  try {
    const catalog = await loadProfileCatalog({ config });
    const custom = config?.profiles.length ?? 0;
    success({
      message: `   ✓ ${catalog.list().length} profiles (${custom} from config)`,
    });
  } catch (err) {
    if (!(err instanceof CatalogValidationError)) {
      throw err;
    }
    error({ message: "   ✗ Profile catalog is invalid" });
    for (const problem of err.problems) {
      info({ message: `     - ${problem}` });
    }
    hasErrors = true;
  }

  newline();
  raw({ message: `${"=".repeat(70)}\n` });

  if (hasErrors) {
    error({ message: "Validation completed with errors" });
    process.exit(1);
  }

  success({ message: "All validation checks passed!" });
};
