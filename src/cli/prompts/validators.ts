/**
 * Prompts validation functions
 *
 * Validators return undefined for valid input, or an error message string
 * for invalid input, matching clack/prompts validation callback signature.
 */

/**
 * Validate a required field
 *
 * @param args - Validation arguments
 * @param args.value - The value to validate
 * @param args.fieldName - Optional field name for the error message
 *
 * @returns Undefined if valid, error message string if invalid
 */
export const validateRequired = (args: {
  value: string;
  fieldName?: string | null;
}): string | undefined => {
  const { value, fieldName } = args;

  if (!value || value.trim() === "") {
    const name = fieldName ?? "This field";
    return `${name} is required`;
  }

  return undefined;
};

/**
 * Validate the path a script will be written to
 *
 * Must name a file: not empty, no line breaks, not ending in a slash
 *
 * @param args - Validation arguments
 * @param args.value - The value to validate
 *
 * @returns Undefined if valid, error message string if invalid
 */
export const validateScriptPath = (args: {
  value: string;
}): string | undefined => {
  const { value } = args;

  const required = validateRequired({ value, fieldName: "Output path" });
  if (required != null) {
    return required;
  }

  if (/[\r\n]/.test(value)) {
    return "Output path must be a single line";
  }

  if (value.endsWith("/")) {
    return "Output path must name a file, not a directory";
  }

  return undefined;
};
