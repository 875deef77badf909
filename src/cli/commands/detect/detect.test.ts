/**
 * Tests for the detect command
 */

import * as path from "path";

import { describe, it, expect, beforeEach, vi } from "vitest";

import { detectMain } from "./detect.js";

const mockStdoutWrite = vi
  .spyOn(process.stdout, "write")
  .mockImplementation(() => true);
const mockConsoleError = vi
  .spyOn(console, "error")
  .mockImplementation(() => {});
const mockExit = vi.spyOn(process, "exit").mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

// A config path that never exists, so only the built-in catalog is used
const configPath = path.join("/nonexistent", "desktop-switcher", "config.json");

describe("detectMain", () => {
  beforeEach(() => {
    mockStdoutWrite.mockClear();
    mockConsoleError.mockClear();
    mockExit.mockClear();
  });

  it("should print the matching profile id", async () => {
    await detectMain({ configPath, env: { XDG_CURRENT_DESKTOP: "KDE" } });

    expect(mockStdoutWrite).toHaveBeenCalledWith("kde-plasma\n");
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("should match any token of a colon-separated value", async () => {
    await detectMain({
      configPath,
      env: { XDG_CURRENT_DESKTOP: "Budgie:GNOME" },
    });

    expect(mockStdoutWrite).toHaveBeenCalledWith("budgie\n");
  });

  it("should exit when XDG_CURRENT_DESKTOP is not set", async () => {
    await expect(detectMain({ configPath, env: {} })).rejects.toThrow(
      "process.exit(1)",
    );

    expect(mockConsoleError).toHaveBeenCalledWith(
      "\x1b[0;31mError: XDG_CURRENT_DESKTOP is not set. Run this from inside your desktop session, or pass --from to generate.\x1b[0m",
    );
  });

  it("should exit when no profile matches", async () => {
    await expect(
      detectMain({ configPath, env: { XDG_CURRENT_DESKTOP: "Unity" } }),
    ).rejects.toThrow("process.exit(1)");

    expect(mockConsoleError).toHaveBeenCalledWith(
      "\x1b[0;31mError: No profile matches XDG_CURRENT_DESKTOP='Unity'.\x1b[0m",
    );
    expect(mockStdoutWrite).not.toHaveBeenCalled();
  });
});
