/**
 * Generate script flow module
 *
 * Provides the interactive script generation experience using @clack/prompts.
 * This flow handles:
 * - Current desktop selection (skipped when it was detected)
 * - Target desktop and package manager selection
 * - Output path entry and overwrite confirmation
 * - Summary and script preview notes, then final confirmation before writing
 */

import {
  intro,
  outro,
  select,
  confirm,
  text,
  spinner,
  note,
  cancel,
  isCancel,
  log,
} from "@clack/prompts";

import { bold, brightCyan, green } from "@/cli/logger.js";
import { validateScriptPath } from "@/cli/prompts/validators.js";
import { PACKAGE_MANAGER_KINDS } from "@/switcher/index.js";

import type {
  ComposeError,
  GeneratedScript,
  PackageManagerKind,
  Profile,
  Result,
  SwitchPlan,
} from "@/switcher/index.js";

const CANCEL_MESSAGE = "No script was written.";

// The preview note shows at most this many script lines
export const PREVIEW_LINE_LIMIT = 30;

/**
 * Unwrap a clack prompt result; a cancelled prompt means nothing is written
 *
 * @param value - The raw prompt result (may be a cancel symbol)
 *
 * @returns The unwrapped value, or null if cancelled
 */
const unwrapPrompt = <T>(value: T | symbol): T | null => {
  if (isCancel(value)) {
    cancel(CANCEL_MESSAGE);
    return null;
  }
  return value;
};

/**
 * Callbacks for the generate script flow
 */
export type GenerateScriptFlowCallbacks = {
  onPlanSwitch: (args: {
    currentProfileId: string;
    targetProfileId: string;
    packageManager: PackageManagerKind;
  }) => Result<SwitchPlan, ComposeError>;
  onDefaultOutputPath: (args: {
    currentProfileId: string;
    targetProfileId: string;
  }) => string;
  onCheckExists: (args: { outputPath: string }) => Promise<boolean>;
  onRenderScript: (args: {
    plan: SwitchPlan;
    outputPath: string;
  }) => GeneratedScript;
  onWriteScript: (args: {
    script: GeneratedScript;
    outputPath: string;
    force: boolean;
  }) => Promise<void>;
};

/**
 * Result of the generate script flow
 */
export type GenerateScriptFlowResult = {
  currentProfileId: string;
  targetProfileId: string;
  packageManager: PackageManagerKind;
  outputPath: string;
} | null;

/**
 * Describe what happens to the display manager
 * @param args - Configuration arguments
 * @param args.plan - Switch plan
 *
 * @returns Short description, e.g., "gdm -> sddm"
 */
export const describeDisplayManagerChange = (args: {
  plan: SwitchPlan;
}): string => {
  const { current, target, transition } = args.plan;
  const { disable, enable } = transition;

  if (disable != null && enable != null) {
    return `${disable} -> ${enable}`;
  }
  if (enable != null) {
    return `enable ${enable}`;
  }
  if (disable != null) {
    const fate = args.plan.diff.toRemove.has(disable) ? "remove" : "keep";
    return `${fate} ${disable} (${target.label} has none)`;
  }
  return current.displayManager == null
    ? "none"
    : `unchanged (${current.displayManager})`;
};

/**
 * Summarize a switch plan, one fact per line
 * @param args - Configuration arguments
 * @param args.plan - Switch plan
 *
 * @returns Summary lines
 */
export const summarizePlan = (args: { plan: SwitchPlan }): Array<string> => {
  const { plan } = args;
  return [
    `From: ${plan.current.label} (${plan.current.id})`,
    `To: ${plan.target.label} (${plan.target.id})`,
    `Package manager: ${plan.commands.kind}`,
    `Remove: ${plan.diff.toRemove.size} package(s)`,
    `Install: ${plan.diff.toInstall.size} package(s)`,
    `Display manager: ${describeDisplayManagerChange({ plan })}`,
  ];
};

/**
 * First lines of a script for the preview note
 * @param args - Configuration arguments
 * @param args.text - Script text
 *
 * @returns Up to PREVIEW_LINE_LIMIT lines, with a count of the rest
 */
export const previewScript = (args: { text: string }): string => {
  const lines = args.text.replace(/\n$/, "").split("\n");
  if (lines.length <= PREVIEW_LINE_LIMIT) {
    return lines.join("\n");
  }
  return [
    ...lines.slice(0, PREVIEW_LINE_LIMIT),
    `... ${lines.length - PREVIEW_LINE_LIMIT} more lines`,
  ].join("\n");
};

const profileOption = (profile: Profile) => ({
  value: profile.id,
  label: profile.label,
  hint: profile.id,
});

/**
 * Execute the interactive generate script flow
 *
 * @param args - Flow configuration
 * @param args.profiles - Catalog profiles in display order
 * @param args.currentProfileId - Detected or requested current profile (skips the first select)
 * @param args.packageManager - Preselected package manager
 * @param args.callbacks - Callback functions for side-effectful operations
 *
 * @returns Result on success, null on cancel or abort
 */
export const generateScriptFlow = async (args: {
  profiles: ReadonlyArray<Profile>;
  currentProfileId?: string | null;
  packageManager?: PackageManagerKind | null;
  callbacks: GenerateScriptFlowCallbacks;
}): Promise<GenerateScriptFlowResult> => {
  const { profiles, callbacks } = args;

  intro("Desktop Switch Script");

  // Step 1: Current desktop
  let currentProfileId: string;
  const known = profiles.find((profile) => profile.id === args.currentProfileId);

  if (known != null) {
    currentProfileId = known.id;
    log.info(`Current desktop: ${bold({ text: known.label })}`);
  } else {
    const selected = unwrapPrompt(
      await select({
        message: "Which desktop are you using now?",
        options: profiles.map(profileOption),
      }),
    );

    if (selected == null) return null;

    currentProfileId = selected;
  }

  // Step 2: Target desktop
  const targets = profiles.filter((profile) => profile.id !== currentProfileId);
  if (targets.length === 0) {
    cancel("There is no other desktop to switch to.");
    return null;
  }

  const targetProfileId = unwrapPrompt(
    await select({
      message: "Which desktop do you want to switch to?",
      options: targets.map(profileOption),
    }),
  );

  if (targetProfileId == null) return null;

  // Step 3: Package manager
  const packageManager = unwrapPrompt(
    await select({
      message: "Which package manager should the script use?",
      options: PACKAGE_MANAGER_KINDS.map((kind) => ({
        value: kind,
        label: kind,
        hint: kind === "pacman" ? "official repositories" : "AUR helper",
      })),
      initialValue: args.packageManager ?? "pacman",
    }),
  );

  if (packageManager == null) return null;

  const plan = callbacks.onPlanSwitch({
    currentProfileId,
    targetProfileId,
    packageManager,
  });

  if (!plan.ok) {
    log.error(plan.error.message);
    return null;
  }

  // Step 4: Output path
  const defaultOutputPath = callbacks.onDefaultOutputPath({
    currentProfileId,
    targetProfileId,
  });

  const outputPath = unwrapPrompt(
    await text({
      message: "Where should the script be written?",
      placeholder: defaultOutputPath,
      initialValue: defaultOutputPath,
      validate: (value) => validateScriptPath({ value: value ?? "" }),
    }),
  );

  if (outputPath == null) return null;

  let force = false;
  if (await callbacks.onCheckExists({ outputPath })) {
    const overwrite = unwrapPrompt(
      await confirm({
        message: `${outputPath} already exists. Overwrite it?`,
        initialValue: false,
      }),
    );

    if (overwrite == null || !overwrite) {
      if (overwrite === false) {
        cancel(CANCEL_MESSAGE);
      }
      return null;
    }
    force = true;
  }

  // Step 5: Summary, preview and confirmation
  note(summarizePlan({ plan: plan.value }).join("\n"), "Switch Summary");

  const script = callbacks.onRenderScript({ plan: plan.value, outputPath });
  note(previewScript({ text: script.text }), `Script Preview: ${script.fileName}`);

  const confirmed = unwrapPrompt(
    await confirm({
      message: `Write the script to ${outputPath}?`,
    }),
  );

  if (confirmed == null || !confirmed) {
    if (confirmed === false) {
      cancel(CANCEL_MESSAGE);
    }
    return null;
  }

  // Step 6: Write
  const s = spinner();
  s.start("Writing script...");

  await callbacks.onWriteScript({ script, outputPath, force });

  s.stop("Script written");

  const nextSteps = [
    green({ text: `Review ${bold({ text: outputPath })} before running it.` }),
    "Then switch to a text console (e.g. Ctrl+Alt+F3), log in and run:",
    `  bash ${outputPath}`,
  ];
  note(nextSteps.join("\n"), "Next Steps");

  outro(brightCyan({ text: "Reboot when the script finishes" }));

  return {
    currentProfileId,
    targetProfileId,
    packageManager,
    outputPath,
  };
};
