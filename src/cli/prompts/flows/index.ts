/**
 * Flow modules index
 *
 * Re-exports all flow modules for CLI commands.
 * Flows provide complete interactive experiences using @clack/prompts.
 */

export {
  describeDisplayManagerChange,
  generateScriptFlow,
  previewScript,
  summarizePlan,
  type GenerateScriptFlowCallbacks,
  type GenerateScriptFlowResult,
} from "./generateScript.js";
