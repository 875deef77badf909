#!/usr/bin/env node

/**
 * Desktop Switcher CLI
 *
 * Generates shell scripts that move an Arch-family desktop from one
 * desktop environment to another. Nothing is executed here.
 */

import { createProgram } from "@/cli/program.js";

const program = createProgram();

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);
