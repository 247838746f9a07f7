import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { noopLogger } from "@ui-rescale/logger";
import { deriveFactors } from "../src/derivation/engine";
import { FactorStoreError } from "../src/errors";
import { SqliteScalingFactorStore } from "../src/store/sqliteStore";

async function writeGui(root: string, relative: string, content: string) {
  const target = path.join(root, relative);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf8");
  return target;
}

describe("deriveFactors", () => {
  let tempDir: string;
  let store: SqliteScalingFactorStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rescale-derive-"));
    store = new SqliteScalingFactorStore(":memory:");
  });

  afterEach(async () => {
    store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("stores per-attribute ratio statistics for every resolution", async () => {
    const originalRoot = path.join(tempDir, "original");
    const originalFile = await writeGui(originalRoot, "menus/a.gui", "x = 10\ny = 20\nsize = { x = 4 y = 8 }\n");
    const scaled2k = await writeGui(path.join(tempDir, "2k"), "menus/a.gui", "x = 15\ny = 30\nsize = { x = 6 y = 12 }\n");
    const scaled4k = await writeGui(path.join(tempDir, "4k"), "menus/a.gui", "x = 20\ny = 40\nsize = { x = 8 y = 16 }\n");

    const outcome = await deriveFactors({
      originalFile,
      originalRoot,
      scaledFiles: { "2K": scaled2k, "4K": scaled4k },
      store,
      logger: noopLogger
    });

    expect(outcome.status).toBe("derived");
    expect(outcome.status === "derived" && outcome.relativePath).toBe("menus/a.gui");
    expect(store.getFileFactors("menus/a.gui", "4K").get("x")).toEqual({
      mean: 2,
      median: 2,
      stdDev: 0,
      min: 2,
      max: 2
    });
    expect(store.getFileFactors("menus/a.gui", "2K").get("size")?.mean).toBe(1.5);
    expect(store.getOriginalValues("menus/a.gui").get("size")).toEqual([4, 8]);
  });

  it("pairs values by position, so a reordered scaled file gives wrong ratios", async () => {
    const originalRoot = path.join(tempDir, "original");
    const originalFile = await writeGui(originalRoot, "b.gui", "x = 10\nx = 40\n");
    const scaled = await writeGui(path.join(tempDir, "4k"), "b.gui", "x = 80\nx = 20\n");

    await deriveFactors({ originalFile, originalRoot, scaledFiles: { "4K": scaled }, store, logger: noopLogger });

    expect(store.getFileFactors("b.gui", "4K").get("x")).toEqual({
      mean: 4.25,
      median: 4.25,
      stdDev: 3.75,
      min: 0.5,
      max: 8
    });
  });

  it("skips a file whose scaled version is missing", async () => {
    const originalRoot = path.join(tempDir, "original");
    const originalFile = await writeGui(originalRoot, "c.gui", "x = 10\n");
    const missing = path.join(tempDir, "4k", "c.gui");

    const outcome = await deriveFactors({
      originalFile,
      originalRoot,
      scaledFiles: { "4K": missing },
      store,
      logger: noopLogger
    });

    expect(outcome).toEqual({ status: "skipped", originalFile, missing: [missing] });
    expect(store.listFactors()).toEqual([]);
  });

  it("propagates store failures", async () => {
    const originalRoot = path.join(tempDir, "original");
    const originalFile = await writeGui(originalRoot, "d.gui", "x = 10\n");
    const scaled = await writeGui(path.join(tempDir, "4k"), "d.gui", "x = 20\n");
    store.close();

    await expect(
      deriveFactors({ originalFile, originalRoot, scaledFiles: { "4K": scaled }, store, logger: noopLogger })
    ).rejects.toThrow(FactorStoreError);
  });
});
