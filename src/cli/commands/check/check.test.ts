/**
 * Tests for the check command
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { checkMain } from "./check.js";

const mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {
  // Suppress console.log output in tests
});
const mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {
  // Suppress console.error output in tests
});
const mockStdoutWrite = vi
  .spyOn(process.stdout, "write")
  .mockImplementation(() => true);
const mockExit = vi.spyOn(process, "exit").mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

describe("check command", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "check-test-"));
    configPath = path.join(tempDir, "config.json");
    mockConsoleLog.mockClear();
    mockConsoleError.mockClear();
    mockStdoutWrite.mockClear();
    mockExit.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should pass without a config file", async () => {
    await checkMain({ configPath });

    expect(mockExit).not.toHaveBeenCalled();
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "\x1b[0;32m   ✓ 11 profiles (0 from config)\x1b[0m",
    );
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "\x1b[0;32mAll validation checks passed!\x1b[0m",
    );
  });

  it("should count profiles added by the config", async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        profiles: [{ id: "hyprland", label: "Hyprland", packages: ["hyprland"] }],
      }),
    );

    await checkMain({ configPath });

    expect(mockConsoleLog).toHaveBeenCalledWith(
      "\x1b[0;32m   ✓ 12 profiles (1 from config)\x1b[0m",
    );
  });

  it("should fail for an invalid config", async () => {
    await fs.writeFile(configPath, JSON.stringify({ packageManager: "apt" }));

    await expect(checkMain({ configPath })).rejects.toThrow("process.exit(1)");

    expect(mockConsoleError).toHaveBeenCalledWith(
      "\x1b[0;31mError:    ✗ Config file does not match the schema\x1b[0m",
    );
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "\x1b[36m     - config/packageManager must be equal to one of the allowed values\x1b[0m",
    );
  });

  it("should fail for repeated profile ids in the config", async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        profiles: [
          { id: "hyprland", label: "Hyprland", packages: ["hyprland"] },
          { id: "hyprland", label: "Hyprland", packages: ["hyprland"] },
        ],
      }),
    );

    await expect(checkMain({ configPath })).rejects.toThrow("process.exit(1)");

    expect(mockConsoleError).toHaveBeenCalledWith(
      "\x1b[0;31mError:    ✗ Profile catalog is invalid\x1b[0m",
    );
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "\x1b[36m     - duplicate profile id 'hyprland'\x1b[0m",
    );
  });
});
