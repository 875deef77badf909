/**
 * Tests for path utility functions
 */

import * as os from "os";
import * as path from "path";

import { describe, it, expect } from "vitest";

import { normalizePath, resolveScriptPath } from "./path.js";

describe("normalizePath", () => {
  describe("default behavior", () => {
    it("should return process.cwd() for an empty value", () => {
      expect(normalizePath({ value: "" })).toBe(process.cwd());
    });

    it("should return the given cwd for an empty value", () => {
      expect(normalizePath({ value: "", cwd: "/work" })).toBe("/work");
    });
  });

  describe("custom paths", () => {
    it("should keep an absolute path", () => {
      expect(normalizePath({ value: "/custom/path" })).toBe("/custom/path");
    });

    it("should expand tilde to home directory", () => {
      expect(normalizePath({ value: "~/scripts" })).toBe(
        path.join(os.homedir(), "scripts"),
      );
    });

    it("should expand a lone tilde", () => {
      expect(normalizePath({ value: "~" })).toBe(os.homedir());
    });

    it("should resolve relative paths against cwd", () => {
      expect(normalizePath({ value: "./out", cwd: "/work" })).toBe("/work/out");
    });

    it("should strip trailing slashes", () => {
      expect(normalizePath({ value: "/custom/path/" })).toBe("/custom/path");
    });
  });

  describe("edge cases", () => {
    it("should collapse . and .. segments", () => {
      expect(normalizePath({ value: "/a/./b/../c" })).toBe("/a/c");
    });

    it("should collapse repeated slashes", () => {
      expect(normalizePath({ value: "/a//b///c" })).toBe("/a/b/c");
    });

    it("should keep the root directory", () => {
      expect(normalizePath({ value: "/" })).toBe("/");
    });
  });
});

describe("resolveScriptPath", () => {
  it("should prefer an explicit output path", () => {
    const result = resolveScriptPath({
      output: "switch.sh",
      outputDir: "/ignored",
      fileName: "desktop-switch-gnome-to-kde-plasma.sh",
      cwd: "/work",
    });

    expect(result).toBe("/work/switch.sh");
  });

  it("should place the default file name in the configured directory", () => {
    const result = resolveScriptPath({
      outputDir: "/home/user/scripts",
      fileName: "desktop-switch-gnome-to-kde-plasma.sh",
      cwd: "/work",
    });

    expect(result).toBe("/home/user/scripts/desktop-switch-gnome-to-kde-plasma.sh");
  });

  it("should fall back to the working directory", () => {
    const result = resolveScriptPath({
      output: null,
      outputDir: null,
      fileName: "desktop-switch-gnome-to-kde-plasma.sh",
      cwd: "/work",
    });

    expect(result).toBe("/work/desktop-switch-gnome-to-kde-plasma.sh");
  });
});
