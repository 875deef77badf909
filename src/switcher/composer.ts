/**
 * Script composer
 *
 * Resolves both profiles, computes the package diff and display manager
 * transition, and renders them as a shell script the user runs later from
 * a text console.
 */

import { diffProfiles, sortPackages } from "./diff.js";
import { planDisplayManagerTransition } from "./displayManager.js";
import { commandsFor } from "./packageManagers.js";

import type { ProfileCatalog } from "./catalog.js";
import type { ComposeError } from "./errors.js";
import type { PackageManagerCommands } from "./packageManagers.js";
import type {
  DiffResult,
  DisplayManagerTransition,
  GeneratedScript,
  Profile,
  Result,
  ScriptSection,
} from "./types.js";

const BANNER_RULE = "# ----------------------------------------------------";

/**
 * Everything needed to render a switch script
 */
export type SwitchPlan = {
  current: Profile;
  target: Profile;
  commands: PackageManagerCommands;
  diff: DiffResult;
  transition: DisplayManagerTransition;
};

/**
 * Escape text for use inside a double-quoted shell string
 * @param text - Raw text
 *
 * @returns Text with \ " $ and ` escaped
 */
export const escapeDoubleQuoted = (text: string): string => {
  return text.replace(/[\\"$`]/g, "\\$&");
};

/**
 * @param name - Display manager name, e.g., "gdm"
 *
 * @returns systemd unit name, e.g., "gdm.service"
 */
const serviceUnit = (name: string): string => {
  return name.endsWith(".service") ? name : `${name}.service`;
};

/**
 * Default file name for a generated script
 * @param args - Configuration arguments
 * @param args.currentProfileId - Active profile id
 * @param args.targetProfileId - Target profile id
 *
 * @returns File name, e.g., "desktop-switch-gnome-to-kde-plasma.sh"
 */
export const defaultScriptFileName = (args: {
  currentProfileId: string;
  targetProfileId: string;
}): string => {
  const { currentProfileId, targetProfileId } = args;
  return `desktop-switch-${currentProfileId}-to-${targetProfileId}.sh`;
};

/**
 * Resolve profiles and package manager, then compute the diff and transition
 *
 * Fails on the first unknown input; nothing is rendered in that case.
 *
 * @param args - Configuration arguments
 * @param args.catalog - Profile catalog
 * @param args.currentProfileId - Active profile id
 * @param args.targetProfileId - Target profile id
 * @param args.packageManager - Package manager name
 *
 * @returns The plan, or the first error encountered
 */
export const planSwitch = (args: {
  catalog: ProfileCatalog;
  currentProfileId: string;
  targetProfileId: string;
  packageManager: string;
}): Result<SwitchPlan, ComposeError> => {
  const { catalog, currentProfileId, targetProfileId, packageManager } = args;

  const current = catalog.lookup({ profileId: currentProfileId });
  if (!current.ok) {
    return current;
  }

  const target = catalog.lookup({ profileId: targetProfileId });
  if (!target.ok) {
    return target;
  }

  const commands = commandsFor({ kind: packageManager });
  if (!commands.ok) {
    return commands;
  }

  return {
    ok: true,
    value: {
      current: current.value,
      target: target.value,
      commands: commands.value,
      diff: diffProfiles({ current: current.value, target: target.value }),
      transition: planDisplayManagerTransition({
        current: current.value,
        target: target.value,
      }),
    },
  };
};

const renderHeader = (args: {
  plan: SwitchPlan;
  runPath: string;
}): ScriptSection => {
  const { plan, runPath } = args;
  const { current, target, commands } = plan;

  const announcement =
    current.id === target.id
      ? `echo "${escapeDoubleQuoted(current.label)} is already the active profile. Nothing to remove or install."`
      : `echo "Switching from ${escapeDoubleQuoted(current.label)} to ${escapeDoubleQuoted(target.label)} using ${commands.kind}..."`;

  return {
    kind: "header",
    lines: [
      "#!/usr/bin/env bash",
      BANNER_RULE,
      "# Generated by desktop-switcher",
      `# From: ${current.label} (${current.id})`,
      `# To: ${target.label} (${target.id})`,
      `# Package manager: ${commands.kind}`,
      "#",
      "# REVIEW THIS SCRIPT BEFORE RUNNING IT.",
      "# Run it from a text console (e.g. Ctrl+Alt+F3), not from a graphical session:",
      `#   bash ${runPath}`,
      BANNER_RULE,
      "set -e",
      "",
      announcement,
    ],
  };
};

const renderRemoval = (plan: SwitchPlan): ScriptSection | null => {
  const command = plan.commands.removeTemplate(sortPackages(plan.diff.toRemove));
  if (command == null) {
    return null;
  }

  // A rerun finds these packages already gone; that must not abort the script
  return {
    kind: "remove",
    lines: [
      `# Remove packages that ${plan.target.label} does not need`,
      `${command} || echo "Package removal failed (already gone or still required); continuing."`,
    ],
  };
};

const renderInstallation = (plan: SwitchPlan): ScriptSection | null => {
  const command = plan.commands.installTemplate(
    sortPackages(plan.diff.toInstall),
  );
  if (command == null) {
    return null;
  }

  return {
    kind: "install",
    lines: [`# Install packages for ${plan.target.label}`, command],
  };
};

/**
 * Render the display manager switch
 *
 * A disable line is only ever written together with an enable line, so the
 * machine always keeps a login screen.
 */
const renderDisplayManager = (plan: SwitchPlan): ScriptSection | null => {
  const { disable, enable } = plan.transition;

  if (enable == null) {
    if (disable == null) {
      return null;
    }
    if (plan.diff.toRemove.has(disable)) {
      return {
        kind: "display-manager",
        lines: [
          `# ${plan.target.label} does not use a display manager; ${disable} was removed with its packages above.`,
          `# Start ${plan.target.label} from a text console after rebooting.`,
        ],
      };
    }
    return {
      kind: "display-manager",
      lines: [
        `# ${plan.target.label} does not use a display manager; ${serviceUnit(disable)} stays installed and enabled.`,
        "# Disable it yourself once you can start the new session from a console.",
      ],
    };
  }

  const enableLine = `sudo systemctl enable --force ${serviceUnit(enable)}`;

  if (disable == null) {
    return {
      kind: "display-manager",
      lines: [
        `# Enable display manager ${enable}`,
        `echo "Enabling display manager: ${enable}"`,
        enableLine,
      ],
    };
  }

  return {
    kind: "display-manager",
    lines: [
      `# Switch display manager from ${disable} to ${enable}`,
      `echo "Switching display manager: ${disable} -> ${enable}"`,
      // The old unit may already be gone with its package
      `sudo systemctl disable ${serviceUnit(disable)} || true`,
      enableLine,
    ],
  };
};

const renderRebootPrompt = (plan: SwitchPlan): ScriptSection => {
  return {
    kind: "reboot",
    lines: [
      'echo ""',
      `echo "Switch to ${escapeDoubleQuoted(plan.target.label)} complete. Reboot to finish."`,
      'read -r -p "Reboot now? [y/N]: " response',
      'case "$response" in',
      "    [yY][eE][sS]|[yY])",
      "        sudo reboot",
      "        ;;",
      "    *)",
      '        echo "Please reboot manually to finish the switch."',
      "        ;;",
      "esac",
    ],
  };
};

/**
 * Render a plan as script text
 * @param args - Configuration arguments
 * @param args.plan - Resolved switch plan
 * @param args.outputPath - Where the script will be written (shown in the banner)
 *
 * @returns The generated script
 */
export const renderScript = (args: {
  plan: SwitchPlan;
  outputPath?: string | null;
}): GeneratedScript => {
  const { plan } = args;
  const fileName = defaultScriptFileName({
    currentProfileId: plan.current.id,
    targetProfileId: plan.target.id,
  });
  // Keep the banner on one comment line whatever the path contains
  const runPath = (args.outputPath ?? fileName).replace(/[\r\n]/g, "?");

  const sections = [
    renderHeader({ plan, runPath }),
    renderRemoval(plan),
    renderInstallation(plan),
    renderDisplayManager(plan),
    renderRebootPrompt(plan),
  ].filter((section): section is ScriptSection => section != null);

  const text =
    sections.map((section) => section.lines.join("\n")).join("\n\n") + "\n";

  return { fileName, sections, text };
};

/**
 * Compose the switch script for a pair of profiles
 *
 * Pure: identical inputs give byte-identical text, and no command is run.
 *
 * @param args - Configuration arguments
 * @param args.catalog - Profile catalog
 * @param args.currentProfileId - Active profile id
 * @param args.targetProfileId - Target profile id
 * @param args.packageManager - Package manager name
 * @param args.outputPath - Where the script will be written
 *
 * @returns The script, or a ProfileNotFoundError / UnsupportedPackageManagerError
 */
export const composeScript = (args: {
  catalog: ProfileCatalog;
  currentProfileId: string;
  targetProfileId: string;
  packageManager: string;
  outputPath?: string | null;
}): Result<GeneratedScript, ComposeError> => {
  const plan = planSwitch(args);
  if (!plan.ok) {
    return plan;
  }

  return {
    ok: true,
    value: renderScript({ plan: plan.value, outputPath: args.outputPath }),
  };
};
