/**
 * Vitest Global Setup
 *
 * Resets the config cache around every test so vi.stubEnv() calls are picked
 * up by the lazily parsed config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
