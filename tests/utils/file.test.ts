import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { searchAndLoadFile } from "../../src/utils/file.js";

const TEST_DIR = join(process.cwd(), "test-temp", "file");
const DEFAULTS = { name: join(TEST_DIR, "store.config"), formats: ["yaml", "json"] };

beforeEach(async () => {
  await mkdir(TEST_DIR, { recursive: true });
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("searchAndLoadFile", () => {
  it("returns null when no default exists", async () => {
    expect(await searchAndLoadFile(null, { defaults: DEFAULTS })).toBeNull();
  });

  it("falls through to the next format", async () => {
    const path = join(TEST_DIR, "store.config.json");
    await writeFile(path, "{}", "utf-8");

    expect(await searchAndLoadFile(null, { defaults: DEFAULTS })).toEqual({
      path,
      content: "{}",
      format: "json",
    });
  });

  it("reports a default that exists but cannot be read", async () => {
    await mkdir(join(TEST_DIR, "store.config.yaml"));
    await writeFile(join(TEST_DIR, "store.config.json"), "{}", "utf-8");

    await expect(searchAndLoadFile(null, { defaults: DEFAULTS })).rejects.toMatchObject({
      code: "EISDIR",
    });
  });

  it("loads an explicit path by its extension", async () => {
    const path = join(TEST_DIR, "custom.yml");
    await writeFile(path, "format: yaml\n", "utf-8");

    expect(await searchAndLoadFile(path, { defaults: DEFAULTS })).toEqual({
      path,
      content: "format: yaml\n",
      format: "yml",
    });
  });
});
