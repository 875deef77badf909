/**
 * Desktop switch engine
 *
 * Re-exports the catalog, adapters, diff, planner and composer.
 */

export {
  ProfileCatalog,
  createProfileCatalog,
  mergeProfileDefinitions,
  parseProfileDefinitions,
} from "./catalog.js";
export {
  composeScript,
  defaultScriptFileName,
  planSwitch,
  renderScript,
  type SwitchPlan,
} from "./composer.js";
export { diffProfiles, sortPackages } from "./diff.js";
export {
  isEmptyTransition,
  planDisplayManagerTransition,
} from "./displayManager.js";
export {
  CatalogValidationError,
  ProfileNotFoundError,
  ScriptExistsError,
  SwitcherError,
  UnsupportedPackageManagerError,
  type ComposeError,
} from "./errors.js";
export {
  commandsFor,
  isPackageManagerKind,
  type CommandTemplate,
  type PackageManagerCommands,
} from "./packageManagers.js";
export { PACKAGE_MANAGER_KINDS } from "./types.js";
export type {
  DiffResult,
  DisplayManagerTransition,
  GeneratedScript,
  PackageManagerKind,
  Profile,
  ProfileDefinition,
  Result,
  ScriptSection,
  ScriptSectionKind,
} from "./types.js";
