import { readdir, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { EmptyInputDirectoryError, InputDirectoryMissingError } from "../errors";

export interface DispatchEntry<T> {
  file: string;
  value: T;
  durationMs: number;
}

export interface DispatchReport<T> {
  rootDir: string;
  concurrency: number;
  entries: DispatchEntry<T>[];
  durationMs: number;
}

export interface RunOverDirectoryOptions<T> {
  rootDir: string;
  extension: string;
  /** Worker count; 0 or undefined means `os.availableParallelism()`. */
  concurrency?: number;
  task: (file: string) => Promise<T>;
}

type TaskResult<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: unknown };

export function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, "").toLowerCase();
}

export function resolveConcurrency(requested: number | undefined): number {
  if (requested === undefined || requested <= 0 || !Number.isFinite(requested)) {
    return Math.max(1, os.availableParallelism());
  }
  return Math.max(1, Math.floor(requested));
}

async function assertDirectory(rootDir: string): Promise<void> {
  try {
    if ((await stat(rootDir)).isDirectory()) {
      return;
    }
  } catch (error) {
    throw new InputDirectoryMissingError(rootDir, error);
  }
  throw new InputDirectoryMissingError(rootDir);
}

async function walk(dir: string, suffix: string, found: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, suffix, found);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(suffix)) {
      found.push(fullPath);
    }
  }
}

/** Files under `rootDir` (recursive) with the given extension, sorted by path. */
export async function listMatchingFiles(rootDir: string, extension: string): Promise<string[]> {
  await assertDirectory(rootDir);
  const found: string[] = [];
  await walk(rootDir, `.${normalizeExtension(extension)}`, found);
  if (!found.length) {
    throw new EmptyInputDirectoryError(rootDir, normalizeExtension(extension));
  }
  return found.sort();
}

/**
 * Runs `task` for every matching file on a fixed number of workers pulling
 * from one shared queue. All tasks run to completion before the first
 * failure, in file order, is re-thrown.
 */
export async function runOverFiles<T>(
  files: readonly string[],
  task: (file: string) => Promise<T>,
  concurrency?: number
): Promise<DispatchEntry<T>[]> {
  const results: TaskResult<T>[] = new Array(files.length);
  let next = 0;
  const workerCount = Math.min(resolveConcurrency(concurrency), Math.max(1, files.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (next < files.length) {
      const index = next++;
      const started = performance.now();
      try {
        const value = await task(files[index]);
        results[index] = { ok: true, value, durationMs: performance.now() - started };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  });
  await Promise.all(workers);

  const entries: DispatchEntry<T>[] = [];
  for (const [index, result] of results.entries()) {
    if (!result.ok) {
      throw result.error;
    }
    entries.push({ file: files[index], value: result.value, durationMs: result.durationMs });
  }
  return entries;
}

export async function runOverDirectory<T>(options: RunOverDirectoryOptions<T>): Promise<DispatchReport<T>> {
  const started = performance.now();
  const files = await listMatchingFiles(options.rootDir, options.extension);
  const concurrency = Math.min(resolveConcurrency(options.concurrency), files.length);
  const entries = await runOverFiles(files, options.task, concurrency);
  return {
    rootDir: options.rootDir,
    concurrency,
    entries,
    durationMs: performance.now() - started
  };
}
