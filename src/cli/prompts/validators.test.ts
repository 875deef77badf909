import { describe, expect, it } from "vitest";

import { validateRequired, validateScriptPath } from "./validators.js";

describe("validateRequired", () => {
  it("should accept a non-empty value", () => {
    expect(validateRequired({ value: "gnome" })).toBeUndefined();
  });

  it("should reject an empty value with the default name", () => {
    expect(validateRequired({ value: "" })).toBe("This field is required");
  });

  it("should reject whitespace with the given field name", () => {
    expect(validateRequired({ value: "   ", fieldName: "Profile" })).toBe(
      "Profile is required",
    );
  });
});

describe("validateScriptPath", () => {
  it("should accept a file path", () => {
    expect(validateScriptPath({ value: "~/switch.sh" })).toBeUndefined();
  });

  it("should reject an empty path", () => {
    expect(validateScriptPath({ value: "" })).toBe("Output path is required");
  });

  it("should reject a directory path", () => {
    expect(validateScriptPath({ value: "/tmp/scripts/" })).toBe(
      "Output path must name a file, not a directory",
    );
  });

  it("should reject line breaks", () => {
    expect(validateScriptPath({ value: "a\nb.sh" })).toBe(
      "Output path must be a single line",
    );
  });
});
