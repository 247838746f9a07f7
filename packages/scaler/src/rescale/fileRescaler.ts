import path from "node:path";
import { LogLevel, serializeError } from "@ui-rescale/shared";
import type { ComponentLogger } from "@ui-rescale/logger";
import { errorMessage } from "../errors";
import { readTextFile, toPosixRelative, writeTextFile, type TextFile } from "../io/textFile";
import { resolveFactorSource, type FactorSource } from "../scaling/factorSource";
import { scaleContent } from "../scaling/valueScaler";

export interface RescaleFileOptions {
  inputFile: string;
  inputRoot: string;
  outputRoot: string;
  factorSource: FactorSource;
  logger: ComponentLogger;
}

export type RescaleOutcome =
  | { status: "unchanged"; inputFile: string; matched: number }
  | { status: "written"; inputFile: string; outputFile: string; matched: number; scaled: number }
  | { status: "failed"; inputFile: string; reason: string; stage: "read" | "write" };

/**
 * Rescales one file into the mirrored location under `outputRoot`. Files with
 * no changed value are not written. Read and write failures are logged and
 * reported as `failed`; factor store errors propagate to the caller.
 */
export async function rescaleFile(options: RescaleFileOptions): Promise<RescaleOutcome> {
  const { inputFile, inputRoot, outputRoot, logger } = options;
  const relativePath = toPosixRelative(inputRoot, inputFile);

  let source: TextFile;
  try {
    source = await readTextFile(inputFile);
  } catch (error) {
    logger.log(LogLevel.ERROR, "file.read_failed", { file: relativePath, error: serializeError(error) });
    return { status: "failed", inputFile, reason: errorMessage(error), stage: "read" };
  }

  const resolveFactor = resolveFactorSource(options.factorSource, relativePath);
  const result = scaleContent(source.content, resolveFactor);

  if (result.content === source.content) {
    logger.log(LogLevel.DEBUG, "file.unchanged", { file: relativePath, matched: result.matched });
    return { status: "unchanged", inputFile, matched: result.matched };
  }

  const outputFile = path.join(outputRoot, path.relative(inputRoot, inputFile));
  try {
    await writeTextFile(outputFile, { content: result.content, encoding: source.encoding });
  } catch (error) {
    logger.log(LogLevel.ERROR, "file.write_failed", {
      file: relativePath,
      outputFile,
      error: serializeError(error)
    });
    return { status: "failed", inputFile, reason: errorMessage(error), stage: "write" };
  }

  logger.log(LogLevel.INFO, "file.written", {
    file: relativePath,
    outputFile,
    matched: result.matched,
    scaled: result.scaled,
    encoding: source.encoding
  });
  return { status: "written", inputFile, outputFile, matched: result.matched, scaled: result.scaled };
}
