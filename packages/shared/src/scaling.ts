/**
 * Ratio statistics for one attribute of one file at one resolution.
 * Every field is null when the comparison produced no usable ratio.
 */
export interface AttributeStatistics {
  mean: number | null;
  median: number | null;
  stdDev: number | null;
  min: number | null;
  max: number | null;
}

export type FactorStatistic = "mean" | "median";

export const FACTOR_STATISTICS: readonly FactorStatistic[] = ["mean", "median"];

/** Resolution label such as "2K" or "4K". */
export type ResolutionLabel = string;

export type FactorsByResolution = Record<ResolutionLabel, Record<string, AttributeStatistics>>;

export interface ScalingFactorRecord extends AttributeStatistics {
  path: string;
  filename: string;
  property: string;
  resolution: ResolutionLabel;
}

export const EMPTY_STATISTICS: Readonly<AttributeStatistics> = Object.freeze({
  mean: null,
  median: null,
  stdDev: null,
  min: null,
  max: null
});
