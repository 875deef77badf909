/**
 * Generate command
 *
 * Composes the switch script for a pair of profiles and writes it to disk.
 * Runs the interactive flow when no target profile is given.
 */

import {
  detectCurrentProfile,
  loadProfileCatalogOrExit,
} from "@/cli/catalog.js";
import { getGlobalOptions } from "@/cli/commands/globalOptions.js";
import { loadConfigOrDefault } from "@/cli/config.js";
import { bold, error, info, newline, raw, success } from "@/cli/logger.js";
import { generateScriptFlow, summarizePlan } from "@/cli/prompts/flows/index.js";
import {
  ScriptExistsError,
  commandsFor,
  defaultScriptFileName,
  planSwitch,
  renderScript,
} from "@/switcher/index.js";
import { normalizePath, resolveScriptPath } from "@/utils/path.js";

import type { Config } from "@/cli/config.js";
import type { PackageManagerKind, ProfileCatalog } from "@/switcher/index.js";
import type { Command } from "commander";

import { scriptExists, writeScript } from "./writeScript.js";

type GenerateOptions = {
  from?: string;
  packageManager?: string;
  output?: string;
  print?: boolean;
  force?: boolean;
};

/**
 * Write a script, reporting an existing file as a CLI error
 * @param args - Configuration arguments
 * @param args.outputPath - Script path
 * @param args.text - Script text
 * @param args.force - Overwrite an existing file
 */
const writeScriptOrExit = async (args: {
  outputPath: string;
  text: string;
  force: boolean;
}): Promise<void> => {
  try {
    await writeScript(args);
  } catch (err) {
    if (err instanceof ScriptExistsError) {
      error({ message: err.message });
      process.exit(1);
    }
    throw err;
  }
};

/**
 * Run the interactive generate flow
 * @param args - Configuration arguments
 * @param args.catalog - Profile catalog
 * @param args.config - Loaded config
 * @param args.currentProfileId - Current profile from --from or detection
 * @param args.packageManager - Preselected package manager
 * @param args.cwd - Working directory for relative paths
 */
const runInteractive = async (args: {
  catalog: ProfileCatalog;
  config: Config;
  currentProfileId: string | null;
  packageManager: PackageManagerKind;
  cwd: string;
}): Promise<void> => {
  const { catalog, config, currentProfileId, packageManager, cwd } = args;

  await generateScriptFlow({
    profiles: catalog.list(),
    currentProfileId,
    packageManager,
    callbacks: {
      onPlanSwitch: (planArgs) => planSwitch({ catalog, ...planArgs }),
      onDefaultOutputPath: (pathArgs) =>
        resolveScriptPath({
          outputDir: config.outputDir,
          fileName: defaultScriptFileName(pathArgs),
          cwd,
        }),
      onCheckExists: async ({ outputPath }) =>
        scriptExists({ outputPath: normalizePath({ value: outputPath, cwd }) }),
      onRenderScript: ({ plan, outputPath }) =>
        renderScript({ plan, outputPath: normalizePath({ value: outputPath, cwd }) }),
      onWriteScript: async ({ script, outputPath, force }) => {
        await writeScriptOrExit({
          outputPath: normalizePath({ value: outputPath, cwd }),
          text: script.text,
          force,
        });
      },
    },
  });
};

/**
 * Main function for the generate command
 * @param args - Configuration arguments
 * @param args.target - Target profile id; runs the interactive flow when omitted
 * @param args.from - Current profile id (defaults to the detected desktop)
 * @param args.packageManager - Package manager (defaults to the config value)
 * @param args.output - Output path (defaults to outputDir/desktop-switch-<from>-to-<to>.sh)
 * @param args.print - Print the script to stdout instead of writing it
 * @param args.force - Overwrite an existing script
 * @param args.configPath - Explicit config path
 * @param args.nonInteractive - Never prompt
 * @param args.env - Environment used for desktop detection
 * @param args.cwd - Working directory for relative paths
 */
export const generateMain = async (args: {
  target?: string | null;
  from?: string | null;
  packageManager?: string | null;
  output?: string | null;
  print?: boolean | null;
  force?: boolean | null;
  configPath?: string | null;
  nonInteractive?: boolean | null;
  env?: NodeJS.ProcessEnv | null;
  cwd?: string | null;
}): Promise<void> => {
  const cwd = args.cwd ?? process.cwd();
  const config = await loadConfigOrDefault({ configPath: args.configPath });
  const catalog = await loadProfileCatalogOrExit({ config });

  const packageManager = args.packageManager ?? config.packageManager;
  const currentProfileId =
    args.from ?? detectCurrentProfile({ catalog, env: args.env })?.id ?? null;

  if (args.target == null || args.target === "") {
    if (args.nonInteractive || args.print) {
      error({
        message: "A target profile is required. Run 'desktop-switcher list' to see them.",
      });
      process.exit(1);
    }

    const commands = commandsFor({ kind: packageManager });
    if (!commands.ok) {
      error({ message: commands.error.message });
      process.exit(1);
    }

    await runInteractive({
      catalog,
      config,
      currentProfileId,
      packageManager: commands.value.kind,
      cwd,
    });
    return;
  }

  if (currentProfileId == null) {
    error({
      message:
        "Could not detect the current desktop from XDG_CURRENT_DESKTOP. Pass --from <profile>.",
    });
    process.exit(1);
  }

  const plan = planSwitch({
    catalog,
    currentProfileId,
    targetProfileId: args.target,
    packageManager,
  });

  if (!plan.ok) {
    error({ message: plan.error.message });
    process.exit(1);
  }

  const outputPath = resolveScriptPath({
    output: args.output,
    outputDir: config.outputDir,
    fileName: defaultScriptFileName({
      currentProfileId: plan.value.current.id,
      targetProfileId: plan.value.target.id,
    }),
    cwd,
  });
  const script = renderScript({ plan: plan.value, outputPath });

  if (args.print) {
    raw({ message: script.text });
    return;
  }

  await writeScriptOrExit({
    outputPath,
    text: script.text,
    force: args.force === true,
  });

  for (const line of summarizePlan({ plan: plan.value })) {
    info({ message: line });
  }
  newline();
  success({ message: `Wrote ${outputPath}` });
  info({
    message: `Review it, then run it from a text console: ${bold({ text: `bash ${outputPath}` })}`,
  });
};

/**
 * Register the 'generate' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerGenerateCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("generate [target]")
    .description("Generate a script that switches to another desktop profile")
    .option("-f, --from <profile>", "Current profile (default: detected)")
    .option(
      "-m, --package-manager <kind>",
      "Package manager: pacman, yay or paru (default: from config)",
    )
    .option("-o, --output <path>", "Where to write the script")
    .option("--print", "Print the script instead of writing it")
    .option("--force", "Overwrite an existing script")
    .action(async (target: string | undefined, options: GenerateOptions) => {
      const { configPath, nonInteractive } = getGlobalOptions({ program });

      await generateMain({
        target: target ?? null,
        from: options.from ?? null,
        packageManager: options.packageManager ?? null,
        output: options.output ?? null,
        print: options.print ?? false,
        force: options.force ?? false,
        configPath,
        nonInteractive,
      });
    });
};
