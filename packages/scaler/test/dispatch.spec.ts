import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listMatchingFiles, resolveConcurrency, runOverDirectory, runOverFiles } from "../src/dispatch/pool";
import { EmptyInputDirectoryError, InputDirectoryMissingError } from "../src/errors";

describe("listMatchingFiles", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rescale-dispatch-"));
    await fs.mkdir(path.join(tempDir, "nested", "deeper"), { recursive: true });
    await fs.writeFile(path.join(tempDir, "b.gui"), "");
    await fs.writeFile(path.join(tempDir, "A.GUI"), "");
    await fs.writeFile(path.join(tempDir, "notes.txt"), "");
    await fs.writeFile(path.join(tempDir, "nested", "deeper", "c.gui"), "");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("walks recursively and compares the extension case-insensitively", async () => {
    const files = await listMatchingFiles(tempDir, ".gui");

    expect(files.map(file => path.relative(tempDir, file))).toEqual([
      "A.GUI",
      "b.gui",
      path.join("nested", "deeper", "c.gui")
    ]);
  });

  it("fails when the directory does not exist", async () => {
    await expect(listMatchingFiles(path.join(tempDir, "absent"), "gui")).rejects.toBeInstanceOf(
      InputDirectoryMissingError
    );
  });

  it("fails when the root is a file", async () => {
    await expect(listMatchingFiles(path.join(tempDir, "b.gui"), "gui")).rejects.toBeInstanceOf(
      InputDirectoryMissingError
    );
  });

  it("fails when no file has the extension", async () => {
    await expect(listMatchingFiles(tempDir, "yml")).rejects.toThrow(
      new EmptyInputDirectoryError(tempDir, "yml").message
    );
  });

  it("reports every file of a directory run", async () => {
    const report = await runOverDirectory({
      rootDir: tempDir,
      extension: "gui",
      concurrency: 2,
      task: async file => path.basename(file)
    });

    expect(report.concurrency).toBe(2);
    expect(report.entries.map(entry => entry.value)).toEqual(["A.GUI", "b.gui", "c.gui"]);
  });
});

describe("runOverFiles", () => {
  it("never runs more tasks at once than the concurrency", async () => {
    let active = 0;
    let peak = 0;
    const files = Array.from({ length: 12 }, (_, index) => `file-${index}`);

    const entries = await runOverFiles(
      files,
      async file => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise(resolve => setTimeout(resolve, 2));
        active -= 1;
        return file.toUpperCase();
      },
      3
    );

    expect(peak).toBe(3);
    expect(entries.map(entry => entry.value)).toEqual(files.map(file => file.toUpperCase()));
  });

  it("finishes every task before re-throwing the first failure in file order", async () => {
    const completed: string[] = [];
    const files = ["a", "b", "c", "d"];

    await expect(
      runOverFiles(
        files,
        async file => {
          if (file === "d") {
            throw new Error("d failed");
          }
          if (file === "b") {
            await new Promise(resolve => setTimeout(resolve, 5));
            throw new Error("b failed");
          }
          completed.push(file);
          return file;
        },
        4
      )
    ).rejects.toThrow("b failed");

    expect(completed.sort()).toEqual(["a", "c"]);
  });
});

describe("resolveConcurrency", () => {
  it("treats 0 and undefined as one worker per available CPU", () => {
    const cpus = Math.max(1, os.availableParallelism());
    expect(resolveConcurrency(0)).toBe(cpus);
    expect(resolveConcurrency(undefined)).toBe(cpus);
    expect(resolveConcurrency(2.7)).toBe(2);
  });
});
