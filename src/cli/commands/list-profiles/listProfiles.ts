/**
 * List command
 * Lists catalog profiles, one per line, for programmatic use
 */

import { loadProfileCatalogOrExit } from "@/cli/catalog.js";
import { getGlobalOptions } from "@/cli/commands/globalOptions.js";
import { loadConfig } from "@/cli/config.js";
import { raw } from "@/cli/logger.js";

import type { Profile } from "@/switcher/index.js";
import type { Command } from "commander";

/**
 * Format one profile as a tab-separated line
 * @param args - Configuration arguments
 * @param args.profile - Profile to format
 *
 * @returns "id<TAB>label<TAB>display manager or -<TAB>package count"
 */
export const formatProfileLine = (args: { profile: Profile }): string => {
  const { profile } = args;
  return [
    profile.id,
    profile.label,
    profile.displayManager ?? "-",
    String(profile.packages.size),
  ].join("\t");
};

/**
 * Main function for list command
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path
 */
export const listProfilesMain = async (args?: {
  configPath?: string | null;
}): Promise<void> => {
  const config = await loadConfig({ configPath: args?.configPath });
  const catalog = await loadProfileCatalogOrExit({ config });

  for (const profile of catalog.list()) {
    raw({ message: `${formatProfileLine({ profile })}\n` });
  }
};

/**
 * Register the 'list' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerListProfilesCommand = (args: {
  program: Command;
}): void => {
  const { program } = args;

  program
    .command("list")
    .description("List known desktop profiles (id, label, display manager, packages)")
    .action(async () => {
      const { configPath } = getGlobalOptions({ program });
      await listProfilesMain({ configPath });
    });
};
