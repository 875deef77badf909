/**
 * JSON schemas shared by the profile catalog and the config file
 */

import { Ajv, type ErrorObject } from "ajv";

/**
 * Arch package names: alphanumerics plus @ . _ + -, not starting with . or -
 */
const PACKAGE_NAME_PATTERN = "^[a-z0-9@_+][a-z0-9@._+-]*$";

export const profileDefinitionSchema = {
  type: "object",
  properties: {
    id: { type: "string", pattern: "^[a-z0-9][a-z0-9._-]*$" },
    label: { type: "string", minLength: 1, pattern: "^[^\\u0000-\\u001f]+$" },
    packages: {
      type: "array",
      items: { type: "string", pattern: PACKAGE_NAME_PATTERN },
    },
    displayManager: {
      type: ["string", "null"],
      pattern: PACKAGE_NAME_PATTERN,
      default: null,
    },
    desktopNames: {
      type: ["array", "null"],
      items: { type: "string", pattern: "^[^:\\s]+$" },
      default: [],
    },
  },
  required: ["id", "label", "packages"],
  additionalProperties: false,
};

export const profileDefinitionListSchema = {
  type: "array",
  items: profileDefinitionSchema,
};

// Shared Ajv instance - applies defaults and drops unknown properties
export const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
  allowUnionTypes: true,
});

/**
 * Turn Ajv errors into readable lines
 * @param args - Configuration arguments
 * @param args.errors - Errors from the last validation call
 * @param args.root - Name used for the document root in messages
 *
 * @returns One line per error, e.g. "profiles/0/id must match pattern ..."
 */
export const formatSchemaErrors = (args: {
  errors: ReadonlyArray<ErrorObject> | null | undefined;
  root: string;
}): Array<string> => {
  const { errors, root } = args;
  if (errors == null) {
    return [];
  }
  return errors.map(
    (err) => `${root}${err.instancePath} ${err.message ?? "is invalid"}`,
  );
};
