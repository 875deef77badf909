/**
 * Path utility functions for user-supplied file and directory paths
 */

import * as os from "os";
import * as path from "path";

/**
 * Normalize a user-supplied path
 * @param args - Configuration arguments
 * @param args.value - The path as typed by the user or read from config
 * @param args.cwd - Directory relative paths resolve against (defaults to process.cwd())
 *
 * @returns Absolute, normalized path without a trailing slash
 */
export const normalizePath = (args: {
  value: string;
  cwd?: string | null;
}): string => {
  const { value } = args;
  const cwd = args.cwd ?? process.cwd();

  if (value === "") {
    return cwd;
  }

  let normalizedPath = value;

  // Expand tilde to home directory
  if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(os.homedir(), normalizedPath.slice(2));
  } else if (normalizedPath === "~") {
    normalizedPath = os.homedir();
  }

  if (!path.isAbsolute(normalizedPath)) {
    normalizedPath = path.join(cwd, normalizedPath);
  }

  // Resolves . and .., collapses repeated slashes
  normalizedPath = path.normalize(normalizedPath);

  if (normalizedPath.length > 1 && normalizedPath.endsWith("/")) {
    normalizedPath = normalizedPath.slice(0, -1);
  }

  return normalizedPath;
};

/**
 * Decide where a generated script is written
 * @param args - Configuration arguments
 * @param args.output - Explicit --output value (optional)
 * @param args.outputDir - Directory from config (optional)
 * @param args.fileName - Default script file name
 * @param args.cwd - Working directory (defaults to process.cwd())
 *
 * @returns Absolute path of the script file
 */
export const resolveScriptPath = (args: {
  output?: string | null;
  outputDir?: string | null;
  fileName: string;
  cwd?: string | null;
}): string => {
  const { output, outputDir, fileName, cwd } = args;

  if (output != null && output !== "") {
    return normalizePath({ value: output, cwd });
  }

  const directory =
    outputDir != null && outputDir !== ""
      ? normalizePath({ value: outputDir, cwd })
      : normalizePath({ value: "", cwd });
  return path.join(directory, fileName);
};
