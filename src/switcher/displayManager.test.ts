/**
 * Tests for display manager transition planning
 */

import { describe, it, expect } from "vitest";

import { ProfileCatalog } from "./catalog.js";
import {
  isEmptyTransition,
  planDisplayManagerTransition,
} from "./displayManager.js";

import type { Profile } from "./types.js";

const catalog = ProfileCatalog.fromValidDefinitions({
  definitions: [
    { id: "gnome", label: "GNOME", packages: ["gdm"], displayManager: "gdm" },
    { id: "kde", label: "KDE Plasma", packages: ["sddm"], displayManager: "sddm" },
    { id: "lxqt", label: "LXQt", packages: ["lxqt"], displayManager: "sddm" },
    { id: "sway", label: "Sway", packages: ["sway"] },
    { id: "river", label: "River", packages: ["river"] },
  ],
});

const profile = (id: string): Profile => {
  const result = catalog.lookup({ profileId: id });
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
};

describe("planDisplayManagerTransition", () => {
  it("should disable the old service and enable the new one", () => {
    expect(
      planDisplayManagerTransition({
        current: profile("gnome"),
        target: profile("kde"),
      }),
    ).toEqual({ disable: "gdm", enable: "sddm" });
  });

  it("should be empty when both profiles use the same service", () => {
    const transition = planDisplayManagerTransition({
      current: profile("kde"),
      target: profile("lxqt"),
    });

    expect(transition).toEqual({ disable: null, enable: null });
    expect(isEmptyTransition(transition)).toBe(true);
  });

  it("should be empty when neither profile uses a display manager", () => {
    expect(
      isEmptyTransition(
        planDisplayManagerTransition({
          current: profile("sway"),
          target: profile("river"),
        }),
      ),
    ).toBe(true);
  });

  it("should be empty for the same profile", () => {
    for (const p of catalog.list()) {
      expect(
        isEmptyTransition(planDisplayManagerTransition({ current: p, target: p })),
      ).toBe(true);
    }
  });

  it("should pair every disable with an enable when both profiles have a display manager", () => {
    for (const current of catalog.list()) {
      for (const target of catalog.list()) {
        const transition = planDisplayManagerTransition({ current, target });
        if (
          current.displayManager != null &&
          target.displayManager != null &&
          transition.disable != null
        ) {
          expect(transition.enable).toBe(target.displayManager);
        }
      }
    }
  });

  it("should only enable when switching from a profile without a display manager", () => {
    expect(
      planDisplayManagerTransition({
        current: profile("sway"),
        target: profile("gnome"),
      }),
    ).toEqual({ disable: null, enable: "gdm" });
  });

  it("should only disable when the target has no display manager", () => {
    expect(
      planDisplayManagerTransition({
        current: profile("gnome"),
        target: profile("sway"),
      }),
    ).toEqual({ disable: "gdm", enable: null });
  });
});
