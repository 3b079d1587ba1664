import { afterEach, beforeEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resetDbState } from "../src/db.js";

// Each test gets its own config and data directory, separate from the user's
let testDir: string | null = null;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "nutrigraph-test-"));
  process.env.NUTRIGRAPH_CONFIG_DIR = join(testDir, "config");
  process.env.NUTRIGRAPH_DATA_DIR = join(testDir, "data");
  resetDbState();
});

afterEach(() => {
  resetDbState();
  if (testDir) {
    rmSync(testDir, { recursive: true, force: true });
    testDir = null;
  }
});
