/**
 * Script output writer
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ScriptExistsError } from "@/switcher/index.js";

const isExistsError = (err: unknown): boolean => {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
};

/**
 * Check whether a script file already exists
 * @param args - Configuration arguments
 * @param args.outputPath - Script path
 *
 * @returns True if something exists at the path
 */
export const scriptExists = async (args: {
  outputPath: string;
}): Promise<boolean> => {
  try {
    await fs.access(args.outputPath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Write a generated script as an executable file
 *
 * Parent directories are created as needed.
 *
 * @param args - Configuration arguments
 * @param args.outputPath - Script path
 * @param args.text - Script text
 * @param args.force - Overwrite an existing file
 *
 * @throws ScriptExistsError if the file exists and force is not set
 */
export const writeScript = async (args: {
  outputPath: string;
  text: string;
  force?: boolean | null;
}): Promise<void> => {
  const { outputPath, text, force } = args;

  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  try {
    await fs.writeFile(outputPath, text, {
      encoding: "utf-8",
      mode: 0o755,
      flag: force ? "w" : "wx",
    });
  } catch (err) {
    if (isExistsError(err)) {
      throw new ScriptExistsError(outputPath);
    }
    throw err;
  }

  // mode only applies when the file is created
  await fs.chmod(outputPath, 0o755);
};
