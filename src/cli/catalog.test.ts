/**
 * Tests for loading the profile catalog
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { CatalogValidationError } from "@/switcher/index.js";

import type { Config } from "@/cli/config.js";

import {
  detectCurrentProfile,
  loadProfileCatalog,
  readBuiltinDefinitions,
} from "./catalog.js";

const makeConfig = (profiles: Config["profiles"]): Config => ({
  configPath: "/test/config.json",
  packageManager: "pacman",
  outputDir: null,
  profiles,
});

describe("readBuiltinDefinitions", () => {
  it("should read the catalog shipped with the package", async () => {
    const definitions = await readBuiltinDefinitions();

    expect(definitions.map((definition) => definition.id)).toEqual([
      "gnome",
      "kde-plasma",
      "xfce4",
      "cinnamon",
      "mate",
      "budgie",
      "lxqt",
      "lxde",
      "cosmic",
      "i3",
      "sway",
    ]);
  });
});

describe("loadProfileCatalog", () => {
  it("should map the built-in desktops to their display managers", async () => {
    const catalog = await loadProfileCatalog({ config: null });

    const displayManagers = Object.fromEntries(
      catalog.list().map((profile) => [profile.id, profile.displayManager]),
    );
    expect(displayManagers).toEqual({
      gnome: "gdm",
      "kde-plasma": "sddm",
      xfce4: "lightdm",
      cinnamon: "lightdm",
      mate: "lightdm",
      budgie: "lightdm",
      lxqt: "sddm",
      lxde: "lightdm",
      cosmic: "cosmic-greeter",
      i3: "lightdm",
      sway: null,
    });
  });

  it("should append profiles from the config", async () => {
    const catalog = await loadProfileCatalog({
      config: makeConfig([
        {
          id: "hyprland",
          label: "Hyprland",
          packages: ["hyprland"],
          displayManager: "sddm",
          desktopNames: ["Hyprland"],
        },
      ]),
    });

    expect(catalog.ids().at(-1)).toBe("hyprland");
    const result = catalog.lookup({ profileId: "hyprland" });
    expect(result.ok).toBe(true);
  });

  it("should replace a built-in profile with the same id", async () => {
    const catalog = await loadProfileCatalog({
      config: makeConfig([
        {
          id: "gnome",
          label: "GNOME (minimal)",
          packages: ["gnome-shell", "gdm"],
          displayManager: "gdm",
          desktopNames: ["GNOME"],
        },
      ]),
    });

    expect(catalog.ids()[0]).toBe("gnome");
    const result = catalog.lookup({ profileId: "gnome" });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.label).toBe("GNOME (minimal)");
      expect(Array.from(result.value.packages)).toEqual(["gnome-shell", "gdm"]);
    }
  });

  describe("with a custom catalog file", () => {
    let tempDir: string;
    let catalogPath: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-test-"));
      catalogPath = path.join(tempDir, "profiles.json");
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should reject a file that is not JSON", async () => {
      await fs.writeFile(catalogPath, "[");

      await expect(
        loadProfileCatalog({ config: null, catalogPath }),
      ).rejects.toBeInstanceOf(CatalogValidationError);
    });

    it("should reject a profile without a label", async () => {
      await fs.writeFile(
        catalogPath,
        JSON.stringify([{ id: "sway", packages: ["sway"] }]),
      );

      await expect(
        loadProfileCatalog({ config: null, catalogPath }),
      ).rejects.toThrow(`${catalogPath}/0 must have required property 'label'`);
    });
  });
});

describe("detectCurrentProfile", () => {
  it("should detect the session from XDG_CURRENT_DESKTOP", async () => {
    const catalog = await loadProfileCatalog({ config: null });

    const profile = detectCurrentProfile({
      catalog,
      env: { XDG_CURRENT_DESKTOP: "ubuntu:GNOME" },
    });

    expect(profile?.id).toBe("gnome");
  });

  it("should detect Cinnamon's X- prefixed name", async () => {
    const catalog = await loadProfileCatalog({ config: null });

    const profile = detectCurrentProfile({
      catalog,
      env: { XDG_CURRENT_DESKTOP: "X-Cinnamon" },
    });

    expect(profile?.id).toBe("cinnamon");
  });

  it("should return null when XDG_CURRENT_DESKTOP is unset", async () => {
    const catalog = await loadProfileCatalog({ config: null });

    expect(detectCurrentProfile({ catalog, env: {} })).toBeNull();
  });

  it("should return null for an unknown desktop", async () => {
    const catalog = await loadProfileCatalog({ config: null });

    expect(
      detectCurrentProfile({ catalog, env: { XDG_CURRENT_DESKTOP: "Unity" } }),
    ).toBeNull();
  });
});
