/**
 * Configuration management for desktop-switcher
 * Functional library for loading and validating the user's config file
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { warn } from "@/cli/logger.js";
import { ajv, formatSchemaErrors, profileDefinitionSchema } from "@/switcher/schema.js";
import { PACKAGE_MANAGER_KINDS } from "@/switcher/types.js";
import { normalizePath } from "@/utils/path.js";

import type { PackageManagerKind, ProfileDefinition } from "@/switcher/types.js";

/**
 * Settings persisted in config.json
 */
export type Config = {
  /** Absolute path the config was read from */
  configPath: string;
  /** Package manager used when --package-manager is not given */
  packageManager: PackageManagerKind;
  /** Directory for generated scripts; null means the working directory */
  outputDir: string | null;
  /** Extra or replacement catalog profiles */
  profiles: Array<ProfileDefinition>;
};

/**
 * JSON structure on disk after schema defaults have been applied
 */
type RawDiskConfig = {
  packageManager: PackageManagerKind;
  outputDir: string | null;
  profiles: Array<ProfileDefinition>;
};

// JSON schema for config.json - single source of truth for validation
const configSchema = {
  type: "object",
  properties: {
    packageManager: {
      type: "string",
      enum: [...PACKAGE_MANAGER_KINDS],
      default: "pacman",
    },
    outputDir: { type: ["string", "null"], default: null },
    profiles: {
      type: "array",
      items: profileDefinitionSchema,
      default: [],
    },
  },
  additionalProperties: false,
};

const validateConfigSchema = ajv.compile<RawDiskConfig>(configSchema);

/**
 * Validation result type
 */
export type ConfigValidationResult = {
  valid: boolean;
  message: string;
  errors?: Array<string> | null;
};

/**
 * Get the directory holding config.json
 * @param args - Configuration arguments
 * @param args.env - Environment to read XDG_CONFIG_HOME from
 *
 * @returns $XDG_CONFIG_HOME/desktop-switcher, or ~/.config/desktop-switcher
 */
export const getDefaultConfigDir = (args?: {
  env?: NodeJS.ProcessEnv | null;
}): string => {
  const env = args?.env ?? process.env;
  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const base =
    xdgConfigHome != null && path.isAbsolute(xdgConfigHome)
      ? xdgConfigHome
      : path.join(os.homedir(), ".config");
  return path.join(base, "desktop-switcher");
};

/**
 * Get the path to the config file
 * @param args - Configuration arguments
 * @param args.configPath - Explicit path from --config (optional)
 *
 * @returns The absolute path to config.json
 */
export const getConfigPath = (args?: { configPath?: string | null }): string => {
  const configPath = args?.configPath;
  if (configPath != null && configPath !== "") {
    return normalizePath({ value: configPath });
  }
  return path.join(getDefaultConfigDir(), "config.json");
};

/**
 * Get the configuration used when no config file exists
 * @param args - Configuration arguments
 * @param args.configPath - Path the config would be read from
 *
 * @returns Default config
 */
export const getDefaultConfig = (args: { configPath: string }): Config => {
  return {
    configPath: args.configPath,
    packageManager: "pacman",
    outputDir: null,
    profiles: [],
  };
};

const isMissingFileError = (err: unknown): boolean => {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
};

/**
 * Parse and validate config file content
 * @param args - Configuration arguments
 * @param args.content - Raw file content
 *
 * @returns The validated disk config, or the problems found
 */
const parseConfig = (args: {
  content: string;
}):
  | { valid: true; config: RawDiskConfig }
  | { valid: false; message: string; errors: Array<string> } => {
  let data: unknown;
  try {
    data = JSON.parse(args.content);
  } catch (err) {
    return {
      valid: false,
      message: "Invalid JSON in config.json",
      errors: [`Config file contains invalid JSON: ${String(err)}`],
    };
  }

  if (!validateConfigSchema(data)) {
    return {
      valid: false,
      message: "Config file does not match the schema",
      errors: formatSchemaErrors({
        errors: validateConfigSchema.errors,
        root: "config",
      }),
    };
  }

  return { valid: true, config: data };
};

/**
 * Load configuration from disk
 * Uses JSON schema validation; defaults fill in missing fields.
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path (optional)
 *
 * @returns The config, or null if the file is missing or invalid
 */
export const loadConfig = async (args?: {
  configPath?: string | null;
}): Promise<Config | null> => {
  const configPath = getConfigPath({ configPath: args?.configPath });

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (!isMissingFileError(err)) {
      warn({ message: `Could not read ${configPath}: ${String(err)}` });
    }
    return null;
  }

  const parsed = parseConfig({ content });
  if (!parsed.valid) {
    warn({
      message: `Ignoring ${configPath}: ${parsed.message} (${parsed.errors.join("; ")})`,
    });
    return null;
  }

  const { packageManager, outputDir, profiles } = parsed.config;
  return {
    configPath,
    packageManager,
    outputDir: outputDir == null ? null : normalizePath({ value: outputDir }),
    profiles,
  };
};

/**
 * Load configuration, falling back to defaults
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path (optional)
 *
 * @returns The config from disk or the default config
 */
export const loadConfigOrDefault = async (args?: {
  configPath?: string | null;
}): Promise<Config> => {
  const config = await loadConfig(args);
  return (
    config ??
    getDefaultConfig({ configPath: getConfigPath({ configPath: args?.configPath }) })
  );
};

/**
 * Validate configuration file
 * @param args - Configuration arguments
 * @param args.configPath - Explicit config path (optional)
 *
 * @returns Validation result with details
 */
export const validateConfig = async (args?: {
  configPath?: string | null;
}): Promise<ConfigValidationResult> => {
  const configPath = getConfigPath({ configPath: args?.configPath });

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) {
      return {
        valid: true,
        message: `No config file at ${configPath}; using defaults`,
      };
    }
    return {
      valid: false,
      message: "Unable to read config.json",
      errors: [`Failed to read config file: ${String(err)}`],
    };
  }

  const parsed = parseConfig({ content });
  if (!parsed.valid) {
    return parsed;
  }

  return { valid: true, message: `Config file ${configPath} is valid` };
};
