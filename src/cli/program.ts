/**
 * Commander program for the desktop-switcher CLI
 */

import { Command } from "commander";

import { registerCheckCommand } from "@/cli/commands/check/check.js";
import { registerDetectCommand } from "@/cli/commands/detect/detect.js";
import { registerGenerateCommand } from "@/cli/commands/generate/generate.js";
import { registerListProfilesCommand } from "@/cli/commands/list-profiles/listProfiles.js";
import { setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

import type { GlobalOptions } from "@/cli/commands/globalOptions.js";

/**
 * Build the CLI program with every command registered
 *
 * @returns Commander program, not yet parsed
 */
export const createProgram = (): Command => {
  const program = new Command();
  const version = getCurrentPackageVersion() ?? "unknown";

  program
    .name("desktop-switcher")
    .version(version)
    .description(
      `Desktop Switcher - reviewable scripts for changing desktop environments v${version}`,
    )
    .option(
      "-c, --config <path>",
      "Config file (default: $XDG_CONFIG_HOME/desktop-switcher/config.json)",
    )
    .option("-n, --non-interactive", "Run without interactive prompts")
    .option("-s, --silent", "Suppress all output (implies --non-interactive)")
    .hook("preAction", () => {
      const { silent } = program.opts<GlobalOptions>();
      setSilentMode({ silent: silent === true });
    })
    .addHelpText(
      "after",
      `
Examples:
  $ desktop-switcher generate                      # choose desktops interactively
  $ desktop-switcher generate kde-plasma           # from the detected desktop
  $ desktop-switcher generate sway --from gnome -m paru -o ~/switch.sh
  $ desktop-switcher generate i3 --print > switch.sh
  $ desktop-switcher list
  $ desktop-switcher detect
  $ desktop-switcher check
`,
    );

  registerGenerateCommand({ program });
  registerListProfilesCommand({ program });
  registerDetectCommand({ program });
  registerCheckCommand({ program });

  return program;
};
