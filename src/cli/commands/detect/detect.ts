/**
 * Detect command
 * Prints the catalog profile matching the running desktop session
 */

import { detectCurrentProfile, loadProfileCatalogOrExit } from "@/cli/catalog.js";
import { getGlobalOptions } from "@/cli/commands/globalOptions.js";
import { loadConfig } from "@/cli/config.js";
import { error, raw } from "@/cli/logger.js";

import type { Command } from "commander";

/**
 * Main function for detect command
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path
 * @param args.env - Environment to read XDG_CURRENT_DESKTOP from
 */
export const detectMain = async (args?: {
  configPath?: string | null;
  env?: NodeJS.ProcessEnv | null;
}): Promise<void> => {
  const env = args?.env ?? process.env;
  const desktopNames = env.XDG_CURRENT_DESKTOP;

  if (desktopNames == null || desktopNames.trim() === "") {
    error({
      message:
        "XDG_CURRENT_DESKTOP is not set. Run this from inside your desktop session, or pass --from to generate.",
    });
    process.exit(1);
  }

  const config = await loadConfig({ configPath: args?.configPath });
  const catalog = await loadProfileCatalogOrExit({ config });
  const profile = detectCurrentProfile({ catalog, env });

  if (profile == null) {
    error({
      message: `No profile matches XDG_CURRENT_DESKTOP='${desktopNames}'.`,
    });
    process.exit(1);
  }

  raw({ message: `${profile.id}\n` });
};

/**
 * Register the 'detect' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerDetectCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("detect")
    .description("Print the profile of the running desktop session")
    .action(async () => {
      const { configPath } = getGlobalOptions({ program });
      await detectMain({ configPath });
    });
};
