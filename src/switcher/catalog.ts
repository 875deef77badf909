/**
 * Profile catalog
 *
 * Immutable registry mapping profile ids to their package sets and display
 * managers. Built once from validated definitions and passed to the composer.
 */

import { CatalogValidationError, ProfileNotFoundError } from "./errors.js";
import { ajv, formatSchemaErrors, profileDefinitionListSchema } from "./schema.js";

import type { Profile, ProfileDefinition, Result } from "./types.js";

const validateDefinitions = ajv.compile<Array<ProfileDefinition>>(
  profileDefinitionListSchema,
);

/**
 * Read-only lookup table of known profiles
 */
export class ProfileCatalog {
  private readonly profiles: ReadonlyMap<string, Profile>;

  private constructor(profiles: ReadonlyArray<Profile>) {
    this.profiles = new Map(profiles.map((profile) => [profile.id, profile]));
  }

  /**
   * Build a catalog from definitions that already passed validation
   * @param args - Configuration arguments
   * @param args.definitions - Validated profile definitions
   *
   * @returns The catalog
   */
  public static fromValidDefinitions(args: {
    definitions: ReadonlyArray<ProfileDefinition>;
  }): ProfileCatalog {
    return new ProfileCatalog(
      args.definitions.map((definition) =>
        Object.freeze({
          id: definition.id,
          label: definition.label,
          packages: new Set(definition.packages),
          displayManager: definition.displayManager ?? null,
          desktopNames: Object.freeze([...(definition.desktopNames ?? [])]),
        }),
      ),
    );
  }

  /**
   * Look up a profile by id
   * @param args - Configuration arguments
   * @param args.profileId - Profile id, e.g., "gnome"
   *
   * @returns The profile, or a ProfileNotFoundError
   */
  public lookup(args: {
    profileId: string;
  }): Result<Profile, ProfileNotFoundError> {
    const { profileId } = args;
    const profile = this.profiles.get(profileId);

    if (profile == null) {
      return {
        ok: false,
        error: new ProfileNotFoundError(profileId, this.ids()),
      };
    }

    return { ok: true, value: profile };
  }

  /**
   * @returns All profiles in definition order
   */
  public list(): Array<Profile> {
    return Array.from(this.profiles.values());
  }

  /**
   * @returns All profile ids in definition order
   */
  public ids(): Array<string> {
    return Array.from(this.profiles.keys());
  }

  /**
   * Find the profile matching an XDG_CURRENT_DESKTOP value
   *
   * The value is a colon-separated list (e.g., "ubuntu:GNOME"); tokens are
   * tried in order and compared case-insensitively.
   *
   * @param args - Configuration arguments
   * @param args.desktopNames - Raw XDG_CURRENT_DESKTOP value
   *
   * @returns The first matching profile, or null
   */
  public detect(args: { desktopNames: string }): Profile | null {
    const tokens = args.desktopNames
      .split(":")
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token !== "");

    for (const token of tokens) {
      for (const profile of this.profiles.values()) {
        const names = profile.desktopNames.map((name) => name.toLowerCase());
        if (names.includes(token)) {
          return profile;
        }
      }
    }

    return null;
  }
}

/**
 * Validate raw profile definitions against the profile schema
 * @param args - Configuration arguments
 * @param args.definitions - Parsed JSON, expected to be an array of profile definitions
 * @param args.source - Name used for the document root in error messages
 *
 * @throws CatalogValidationError if a definition is invalid
 *
 * @returns Definitions with defaults applied
 */
export const parseProfileDefinitions = (args: {
  definitions: unknown;
  source?: string | null;
}): Array<ProfileDefinition> => {
  // Validation fills defaults in place, so work on a copy
  const data: unknown = structuredClone(args.definitions);

  if (!validateDefinitions(data)) {
    throw new CatalogValidationError(
      formatSchemaErrors({
        errors: validateDefinitions.errors,
        root: args.source ?? "profiles",
      }),
    );
  }

  return data;
};

/**
 * Validate raw definitions and build a catalog
 * @param args - Configuration arguments
 * @param args.definitions - Parsed JSON, expected to be an array of profile definitions
 *
 * @throws CatalogValidationError if a definition is invalid or an id repeats
 *
 * @returns The catalog
 */
export const createProfileCatalog = (args: {
  definitions: unknown;
}): ProfileCatalog => {
  const definitions = parseProfileDefinitions({
    definitions: args.definitions,
  });

  const seen = new Set<string>();
  const problems: Array<string> = [];
  for (const definition of definitions) {
    if (seen.has(definition.id)) {
      problems.push(`duplicate profile id '${definition.id}'`);
    }
    seen.add(definition.id);
  }
  if (problems.length > 0) {
    throw new CatalogValidationError(problems);
  }

  return ProfileCatalog.fromValidDefinitions({ definitions });
};

/**
 * Merge user-defined profiles into the built-in list
 *
 * The first override with an existing id replaces that profile in place;
 * every other override is appended.
 *
 * @param args - Configuration arguments
 * @param args.base - Built-in definitions
 * @param args.overrides - Definitions from the config file
 *
 * @returns Merged definitions
 */
export const mergeProfileDefinitions = (args: {
  base: ReadonlyArray<ProfileDefinition>;
  overrides: ReadonlyArray<ProfileDefinition>;
}): Array<ProfileDefinition> => {
  const { base, overrides } = args;
  const baseIds = new Set(base.map((definition) => definition.id));
  const replacements = new Map<string, ProfileDefinition>();
  const appended: Array<ProfileDefinition> = [];

  for (const override of overrides) {
    if (baseIds.has(override.id) && !replacements.has(override.id)) {
      replacements.set(override.id, override);
    } else {
      // Repeated ids stay in the list so catalog validation reports them
      appended.push(override);
    }
  }

  return [
    ...base.map((definition) => replacements.get(definition.id) ?? definition),
    ...appended,
  ];
};
