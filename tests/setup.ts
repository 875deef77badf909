import * as fs from "fs";
import * as path from "path";

import { afterAll, afterEach, beforeAll, vi } from "vitest";

/**
 * Find generated switch scripts in a directory
 * @param dir - Directory to scan
 *
 * @returns Paths of files named like desktop-switch-<from>-to-<to>.sh
 */
export const detectLeakedScripts = (dir: string): Array<string> =>
  fs
    .readdirSync(dir)
    .filter((name) => /^desktop-switch-.+-to-.+\.sh$/.test(name))
    .map((name) => path.join(dir, name));

const leakedScripts = (): Array<string> => detectLeakedScripts(process.cwd());

// Set test environment
beforeAll(() => {
  process.env.NODE_ENV = "test";

  // Pre-test check: scripts left in CWD by a previous run
  const existing = leakedScripts();
  if (existing.length > 0) {
    throw new Error(
      `CONTAINMENT BREAK: generated scripts exist in CWD before tests run: ${existing.join(", ")}. ` +
        `Remove them and run tests again.`,
    );
  }
});

afterEach(() => {
  vi.clearAllMocks();
});

// Post-test check: tests must write scripts into temp directories only
afterAll(() => {
  const leaked = leakedScripts();
  if (leaked.length > 0) {
    for (const name of leaked) {
      fs.rmSync(name, { force: true });
    }
    throw new Error(
      `CONTAINMENT BREAK: tests wrote ${leaked.join(", ")} into CWD. ` +
        `Pass a temp directory as cwd or --output.`,
    );
  }
});
