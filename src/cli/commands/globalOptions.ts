/**
 * Options accepted before any command name
 */

import type { Command } from "commander";

export type GlobalOptions = {
  config?: string;
  nonInteractive?: boolean;
  silent?: boolean;
};

/**
 * Read the global options from the root program
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 *
 * @returns Global options; --silent implies --non-interactive
 */
export const getGlobalOptions = (args: {
  program: Command;
}): { configPath: string | null; nonInteractive: boolean } => {
  const opts = args.program.opts<GlobalOptions>();
  return {
    configPath: opts.config ?? null,
    nonInteractive: opts.nonInteractive === true || opts.silent === true,
  };
};
