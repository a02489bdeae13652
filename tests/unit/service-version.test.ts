/**
 * SERVICE_VERSION Regression Test
 *
 * Catches path resolution bugs that would make the version fall back to "0.0.0".
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { SERVICE_VERSION } from "../../src/version.js";

describe("SERVICE_VERSION", () => {
  it("resolves to the package.json version", () => {
    const pkg: unknown = JSON.parse(
      readFileSync(fileURLToPath(new URL("../../package.json", import.meta.url)), "utf-8"),
    );
    const expectedVersion =
      typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;

    expect(SERVICE_VERSION).toBe(expectedVersion);
    expect(SERVICE_VERSION).not.toBe("0.0.0");
  });
});
