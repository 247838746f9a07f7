import { stat } from "node:fs/promises";
import path from "node:path";
import { LogLevel, serializeError, type FactorsByResolution, type ResolutionLabel } from "@ui-rescale/shared";
import type { ComponentLogger } from "@ui-rescale/logger";
import { errorMessage } from "../errors";
import { readTextFile, toPosixRelative } from "../io/textFile";
import type { SaveSummary, ScalingFactorStore } from "../store/types";
import { extractPositionalValues, type PositionalValues } from "./extract";
import { calculatePropertyScaling } from "./statistics";

export interface DeriveFactorsOptions {
  originalFile: string;
  /** Root the original was found under; the store key is the path relative to it. */
  originalRoot: string;
  scaledFiles: Record<ResolutionLabel, string>;
  store: Pick<ScalingFactorStore, "saveFileFactors">;
  logger: ComponentLogger;
}

export type DerivationOutcome =
  | { status: "skipped"; originalFile: string; missing: string[] }
  | { status: "failed"; originalFile: string; reason: string }
  | {
      status: "derived";
      originalFile: string;
      relativePath: string;
      statistics: FactorsByResolution;
      saved: SaveSummary;
    };

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function readValues(filePath: string): Promise<PositionalValues> {
  const file = await readTextFile(filePath);
  return extractPositionalValues(file.content);
}

/**
 * Compares one original file with its scaled versions and stores the ratio
 * statistics per attribute and resolution.
 *
 * Values are paired purely by position within each attribute: the n-th
 * `width` of the original is compared with the n-th `width` of each scaled
 * version. Edits that add, remove or reorder attributes between versions are
 * not detected and shift the pairing.
 */
export async function deriveFactors(options: DeriveFactorsOptions): Promise<DerivationOutcome> {
  const { originalFile, originalRoot, scaledFiles, store, logger } = options;
  const relativePath = toPosixRelative(originalRoot, originalFile);

  const candidates = [originalFile, ...Object.values(scaledFiles)];
  const present = await Promise.all(candidates.map(isFile));
  const missing = candidates.filter((_, index) => !present[index]);
  if (missing.length) {
    logger.log(LogLevel.WARN, "derive.skipped_missing", { file: relativePath, missing });
    return { status: "skipped", originalFile, missing };
  }

  let original: PositionalValues;
  const scaled = new Map<ResolutionLabel, PositionalValues>();
  try {
    original = await readValues(originalFile);
    for (const [label, scaledFile] of Object.entries(scaledFiles)) {
      scaled.set(label, await readValues(scaledFile));
    }
  } catch (error) {
    logger.log(LogLevel.ERROR, "derive.read_failed", { file: relativePath, error: serializeError(error) });
    return { status: "failed", originalFile, reason: errorMessage(error) };
  }

  const statistics: FactorsByResolution = {};
  for (const [label, values] of scaled) {
    statistics[label] = calculatePropertyScaling(original, values);
  }

  let saved: SaveSummary;
  try {
    saved = store.saveFileFactors({
      relativePath,
      filename: path.basename(originalFile),
      originalValues: original,
      factors: statistics
    });
  } catch (error) {
    logger.log(LogLevel.ERROR, "derive.store_failed", { file: relativePath, error: serializeError(error) });
    throw error;
  }

  logger.log(LogLevel.INFO, "derive.stored", {
    file: relativePath,
    properties: saved.properties,
    originalValues: saved.originalValues,
    factors: saved.factors
  });
  return { status: "derived", originalFile, relativePath, statistics, saved };
}
