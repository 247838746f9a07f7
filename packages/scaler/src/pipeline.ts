import path from "node:path";
import { LogLevel, type FactorStatistic, type ResolutionLabel } from "@ui-rescale/shared";
import type { ComponentLogger } from "@ui-rescale/logger";
import { deriveFactors, type DerivationOutcome } from "./derivation/engine";
import { runOverDirectory, type DispatchReport } from "./dispatch/pool";
import { rescaleFile, type RescaleOutcome } from "./rescale/fileRescaler";
import {
  describeFactorSource,
  fixedFactor,
  storedFactors,
  type FactorSource
} from "./scaling/factorSource";
import type { ScalingFactorStore } from "./store/types";

interface DirectoryOptions {
  extension: string;
  concurrency?: number;
  logger: ComponentLogger;
}

export interface ScaleDirectoryOptions extends DirectoryOptions {
  inputDir: string;
  outputDir: string;
}

export interface ScaleSummary {
  files: number;
  written: number;
  unchanged: number;
  failed: number;
  outcomes: RescaleOutcome[];
  durationMs: number;
}

export interface DeriveDirectoryOptions extends DirectoryOptions {
  originalDir: string;
  references: Record<ResolutionLabel, string>;
  store: Pick<ScalingFactorStore, "saveFileFactors">;
}

export interface DeriveSummary {
  files: number;
  derived: number;
  skipped: number;
  failed: number;
  outcomes: DerivationOutcome[];
  durationMs: number;
}

function countBy<T extends { status: string }>(items: readonly T[], status: T["status"]): number {
  return items.filter(item => item.status === status).length;
}

async function scaleDirectory(
  options: ScaleDirectoryOptions,
  factorSource: FactorSource
): Promise<ScaleSummary> {
  const logger = options.logger.child("rescale", describeFactorSource(factorSource));
  const report: DispatchReport<RescaleOutcome> = await runOverDirectory({
    rootDir: options.inputDir,
    extension: options.extension,
    concurrency: options.concurrency,
    task: inputFile =>
      rescaleFile({
        inputFile,
        inputRoot: options.inputDir,
        outputRoot: options.outputDir,
        factorSource,
        logger
      })
  });

  const outcomes = report.entries.map(entry => entry.value);
  const summary: ScaleSummary = {
    files: outcomes.length,
    written: countBy(outcomes, "written"),
    unchanged: countBy(outcomes, "unchanged"),
    failed: countBy(outcomes, "failed"),
    outcomes,
    durationMs: report.durationMs
  };
  logger.log(summary.failed ? LogLevel.WARN : LogLevel.INFO, "rescale.completed", {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    concurrency: report.concurrency,
    files: summary.files,
    written: summary.written,
    unchanged: summary.unchanged,
    failed: summary.failed,
    durationMs: Math.round(report.durationMs)
  });
  return summary;
}

/** Multiplies every eligible value in `inputDir` by one factor. */
export async function scaleDirectoryByFactor(
  options: ScaleDirectoryOptions & { factor: number }
): Promise<ScaleSummary> {
  return scaleDirectory(options, fixedFactor(options.factor));
}

/**
 * Applies stored per-file, per-attribute factors for one resolution. Files
 * and attributes with no stored factor are left as written.
 */
export async function scaleDirectoryByResolution(
  options: ScaleDirectoryOptions & {
    resolution: ResolutionLabel;
    statistic?: FactorStatistic;
    store: Pick<ScalingFactorStore, "getFileFactors">;
  }
): Promise<ScaleSummary> {
  return scaleDirectory(options, storedFactors(options.store, options.resolution, options.statistic));
}

/**
 * Derives factors for every file in `originalDir` against the file at the
 * same relative path in each reference directory.
 */
export async function deriveDirectoryFactors(options: DeriveDirectoryOptions): Promise<DeriveSummary> {
  const logger = options.logger.child("derive", { resolutions: Object.keys(options.references) });
  const report = await runOverDirectory({
    rootDir: options.originalDir,
    extension: options.extension,
    concurrency: options.concurrency,
    task: originalFile => {
      const relative = path.relative(options.originalDir, originalFile);
      const scaledFiles: Record<ResolutionLabel, string> = {};
      for (const [label, dir] of Object.entries(options.references)) {
        scaledFiles[label] = path.join(dir, relative);
      }
      return deriveFactors({
        originalFile,
        originalRoot: options.originalDir,
        scaledFiles,
        store: options.store,
        logger
      });
    }
  });

  const outcomes = report.entries.map(entry => entry.value);
  const summary: DeriveSummary = {
    files: outcomes.length,
    derived: countBy(outcomes, "derived"),
    skipped: countBy(outcomes, "skipped"),
    failed: countBy(outcomes, "failed"),
    outcomes,
    durationMs: report.durationMs
  };
  logger.log(summary.failed ? LogLevel.WARN : LogLevel.INFO, "derive.completed", {
    originalDir: options.originalDir,
    concurrency: report.concurrency,
    files: summary.files,
    derived: summary.derived,
    skipped: summary.skipped,
    failed: summary.failed,
    durationMs: Math.round(report.durationMs)
  });
  return summary;
}
