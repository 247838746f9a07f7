import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { noopLogger } from "@ui-rescale/logger";
import { InvalidFactorError } from "../src/errors";
import {
  deriveDirectoryFactors,
  scaleDirectoryByFactor,
  scaleDirectoryByResolution
} from "../src/pipeline";
import { SqliteScalingFactorStore } from "../src/store/sqliteStore";

async function writeTree(root: string, files: Record<string, string>) {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
  }
}

async function readTree(root: string, prefix = ""): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  for (const entry of await fs.readdir(path.join(root, prefix), { withFileTypes: true })) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      Object.assign(tree, await readTree(root, relative));
    } else {
      tree[relative] = await fs.readFile(path.join(root, relative), "utf8");
    }
  }
  return tree;
}

const ORIGINAL = {
  "main.gui": "x = 10\ny = 20\nwidth = 50%\n",
  "menus/options.gui": "size = { x = 5 y = 5 }\nmaxWidth = 17\n",
  "menus/static.gui": "name = title\nx = -1\n"
};

describe("pipelines", () => {
  let tempDir: string;
  let inputDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rescale-pipeline-"));
    inputDir = path.join(tempDir, "original");
    await writeTree(inputDir, ORIGINAL);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("scales a directory by one factor and skips unchanged files", async () => {
    const outputDir = path.join(tempDir, "out");
    const summary = await scaleDirectoryByFactor({
      inputDir,
      outputDir,
      extension: "gui",
      factor: 2,
      logger: noopLogger
    });

    expect(summary).toMatchObject({ files: 3, written: 2, unchanged: 1, failed: 0 });
    expect(await readTree(outputDir)).toEqual({
      "main.gui": "x = 20\ny = 40\nwidth = 50%\n",
      "menus/options.gui": "size = { x = 10 y = 10 }\nmaxWidth = 34\n"
    });
  });

  it("produces the same output with one worker and with many", async () => {
    const sequential = path.join(tempDir, "sequential");
    const pooled = path.join(tempDir, "pooled");
    await scaleDirectoryByFactor({ inputDir, outputDir: sequential, extension: "gui", factor: 0.6, concurrency: 1, logger: noopLogger });
    await scaleDirectoryByFactor({ inputDir, outputDir: pooled, extension: "gui", factor: 0.6, concurrency: 8, logger: noopLogger });

    expect(await readTree(pooled)).toEqual(await readTree(sequential));
  });

  it("rejects a non-positive factor before touching any file", async () => {
    const outputDir = path.join(tempDir, "out");
    let pending: Promise<unknown> | undefined;
    expect(() => {
      pending = scaleDirectoryByFactor({ inputDir, outputDir, extension: "gui", factor: 0, logger: noopLogger });
    }).not.toThrow();

    await expect(pending).rejects.toBeInstanceOf(InvalidFactorError);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  it("derives factors from a reference set and reapplies them", async () => {
    const reference = path.join(tempDir, "4k");
    await writeTree(reference, {
      "main.gui": "x = 20\ny = 30\nwidth = 50%\n",
      "menus/options.gui": "size = { x = 15 y = 15 }\nmaxWidth = 34\n"
    });
    const store = new SqliteScalingFactorStore(":memory:");
    try {
      const derived = await deriveDirectoryFactors({
        originalDir: inputDir,
        references: { "4K": reference },
        extension: "gui",
        store,
        logger: noopLogger
      });
      expect(derived).toMatchObject({ files: 3, derived: 2, skipped: 1, failed: 0 });

      const outputDir = path.join(tempDir, "applied");
      const applied = await scaleDirectoryByResolution({
        inputDir,
        outputDir,
        extension: "gui",
        resolution: "4K",
        store,
        logger: noopLogger
      });

      expect(applied).toMatchObject({ written: 2, unchanged: 1 });
      expect(await readTree(outputDir)).toEqual({
        "main.gui": "x = 20\ny = 30\nwidth = 50%\n",
        "menus/options.gui": "size = { x = 15 y = 15 }\nmaxWidth = 34\n"
      });
    } finally {
      store.close();
    }
  });
});
