import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { LogLevel, serializeError } from "@ui-rescale/shared";
import type { ComponentLogger } from "@ui-rescale/logger";
import { listMatchingFiles } from "../dispatch/pool";
import { SetupError } from "../errors";
import { readTextFile, toPosixRelative } from "../io/textFile";

export interface SearchOptions {
  inputDir: string;
  extension: string;
  query: string;
  outputFile: string;
  logger: ComponentLogger;
}

export interface SearchSummary {
  outputFile: string;
  filesSearched: number;
  filesMatched: number;
  totalMatches: number;
}

export const DEFAULT_RESULTS_FILENAME = "search_results.txt";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export function formatSearchResults(results: ReadonlyArray<{ file: string; matches: readonly string[] }>): string {
  return results
    .filter(result => result.matches.length > 0)
    .map(result => [`File: ${result.file}`, ...result.matches.map(match => `Match: ${match}`), ""].join("\n") + "\n")
    .join("");
}

/**
 * Case-insensitive literal search over every matching file under `inputDir`.
 * Each hit is reported with the text as it appears in the file.
 */
export async function searchTextFiles(options: SearchOptions): Promise<SearchSummary> {
  if (!options.query) {
    throw new SetupError("Search query must not be empty.");
  }
  const { logger } = options;
  const files = await listMatchingFiles(options.inputDir, options.extension);
  const pattern = new RegExp(escapeRegExp(options.query), "gi");

  let outputFile = options.outputFile;
  if (await isDirectory(outputFile)) {
    outputFile = path.join(outputFile, DEFAULT_RESULTS_FILENAME);
    logger.log(LogLevel.WARN, "search.output_is_directory", { outputFile });
  }

  const results: Array<{ file: string; matches: string[] }> = [];
  for (const file of files) {
    const relativePath = toPosixRelative(options.inputDir, file);
    try {
      const { content } = await readTextFile(file);
      results.push({ file: relativePath, matches: content.match(pattern) ?? [] });
    } catch (error) {
      logger.log(LogLevel.ERROR, "search.read_failed", { file: relativePath, error: serializeError(error) });
    }
  }

  await mkdir(path.dirname(outputFile), { recursive: true });
  await writeFile(outputFile, formatSearchResults(results), "utf8");

  const summary: SearchSummary = {
    outputFile,
    filesSearched: files.length,
    filesMatched: results.filter(result => result.matches.length > 0).length,
    totalMatches: results.reduce((sum, result) => sum + result.matches.length, 0)
  };
  logger.log(LogLevel.INFO, "search.completed", { ...summary, query: options.query });
  return summary;
}
