/**
 * Shared logging utilities for desktop-switcher
 * Provides colorized console output functions and file logging
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

// Silent mode flag - when true, all console output is suppressed
let silentMode = false;

// Turned off after the first failed write so a read-only tmpdir does not break the CLI
let fileLoggingEnabled = true;

/**
 * Enable or disable silent mode
 * When silent mode is enabled, all console output is suppressed
 *
 * @param args - Configuration arguments
 * @param args.silent - Whether to enable silent mode
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  silentMode = args.silent;
};

/**
 * Check if silent mode is enabled
 *
 * @returns Whether silent mode is currently enabled
 */
export const isSilentMode = (): boolean => {
  return silentMode;
};

// ANSI color codes for output
const colors = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  BLUE: "\x1b[36m",
  NC: "\x1b[0m", // No Color
};

const formatColors = {
  BRIGHT_CYAN: "\x1b[96m",
  BOLD_WHITE: "\x1b[1;37m",
  GRAY: "\x1b[90m",
  BOLD: "\x1b[1m",
};

// Log file path for debugging generated scripts
export const LOG_FILE = path.join(os.tmpdir(), "desktop-switcher.log");

/**
 * Append message to log file
 * @param args - Configuration arguments
 * @param args.message - Message to log
 * @param args.level - Log level (error, success, info, warn, debug)
 */
const appendToLogFile = (args: { message: string; level: string }): void => {
  const { message, level } = args;
  if (!fileLoggingEnabled) {
    return;
  }
  try {
    const timestamp = new Date().toISOString();
    fs.appendFileSync(LOG_FILE, `[${timestamp}] [${level}] ${message}\n`);
  } catch {
    fileLoggingEnabled = false;
  }
};

/**
 * Print error message in red
 * @param args - Configuration arguments
 * @param args.message - Error message to display
 */
export const error = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.error(`${colors.RED}Error: ${message}${colors.NC}`);
  }
  appendToLogFile({ message, level: "ERROR" });
};

/**
 * Print success message in green
 * @param args - Configuration arguments
 * @param args.message - Success message to display
 */
export const success = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.GREEN}${message}${colors.NC}`);
  }
  appendToLogFile({ message, level: "SUCCESS" });
};

/**
 * Print info message in blue
 * @param args - Configuration arguments
 * @param args.message - Info message to display
 */
export const info = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.BLUE}${message}${colors.NC}`);
  }
  appendToLogFile({ message, level: "INFO" });
};

/**
 * Print warning message in yellow
 * @param args - Configuration arguments
 * @param args.message - Warning message to display
 */
export const warn = (args: { message: string }): void => {
  const { message } = args;
  if (!silentMode) {
    console.log(`${colors.YELLOW}Warning: ${message}${colors.NC}`);
  }
  appendToLogFile({ message, level: "WARN" });
};

/**
 * Log debug message to file only (no console output)
 * @param args - Configuration arguments
 * @param args.message - Debug message to log
 */
export const debug = (args: { message: string }): void => {
  appendToLogFile({ message: args.message, level: "DEBUG" });
};

/**
 * Print an empty line
 */
export const newline = (): void => {
  if (!silentMode) {
    console.log();
  }
};

/**
 * Write text to stdout exactly as given, for output meant to be piped
 * @param args - Configuration arguments
 * @param args.message - Text to write
 */
export const raw = (args: { message: string }): void => {
  if (!silentMode) {
    process.stdout.write(args.message);
  }
};

/**
 * @param args - Configuration arguments
 * @param args.text - Text to color
 *
 * @returns Text wrapped in bright cyan ANSI color codes
 */
export const brightCyan = (args: { text: string }): string => {
  return `${formatColors.BRIGHT_CYAN}${args.text}${colors.NC}`;
};

/**
 * @param args - Configuration arguments
 * @param args.text - Text to color
 *
 * @returns Text wrapped in green ANSI color codes
 */
export const green = (args: { text: string }): string => {
  return `${colors.GREEN}${args.text}${colors.NC}`;
};

/**
 * @param args - Configuration arguments
 * @param args.text - Text to emphasize
 *
 * @returns Text wrapped in bold ANSI codes
 */
export const bold = (args: { text: string }): string => {
  return `${formatColors.BOLD}${args.text}${colors.NC}`;
};

/**
 * Print text in gray (for descriptions)
 * @param args - Configuration arguments
 * @param args.text - Text to display
 *
 * @returns Text wrapped in gray ANSI color codes
 */
export const gray = (args: { text: string }): string => {
  return `${formatColors.GRAY}${args.text}${colors.NC}`;
};
