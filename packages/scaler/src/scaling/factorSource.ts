import type { AttributeStatistics, FactorStatistic, ResolutionLabel } from "@ui-rescale/shared";
import { InvalidFactorError } from "../errors";
import type { ScalingFactorStore } from "../store/types";
import type { FactorResolver } from "./valueScaler";

export interface FixedFactorSource {
  kind: "fixed";
  factor: number;
}

export interface StoredFactorSource {
  kind: "stored";
  resolution: ResolutionLabel;
  statistic: FactorStatistic;
  store: Pick<ScalingFactorStore, "getFileFactors">;
}

export type FactorSource = FixedFactorSource | StoredFactorSource;

export function isValidFactor(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export function fixedFactor(factor: number): FixedFactorSource {
  if (!isValidFactor(factor)) {
    throw new InvalidFactorError(factor);
  }
  return { kind: "fixed", factor };
}

export function storedFactors(
  store: Pick<ScalingFactorStore, "getFileFactors">,
  resolution: ResolutionLabel,
  statistic: FactorStatistic = "mean"
): StoredFactorSource {
  return { kind: "stored", resolution, statistic, store };
}

function pickStatistic(stats: AttributeStatistics | undefined, statistic: FactorStatistic): number | null {
  const value = stats?.[statistic];
  return isValidFactor(value) ? value : null;
}

/**
 * Builds the per-attribute lookup for one file. Stored factors are read once
 * here; attributes without a usable statistic resolve to null and stay as
 * written.
 */
export function resolveFactorSource(source: FactorSource, relativePath: string): FactorResolver {
  switch (source.kind) {
    case "fixed":
      return () => source.factor;
    case "stored": {
      const factors = source.store.getFileFactors(relativePath, source.resolution);
      return name => pickStatistic(factors.get(name), source.statistic);
    }
  }
}

export function describeFactorSource(source: FactorSource): Record<string, unknown> {
  return source.kind === "fixed"
    ? { mode: "fixed", factor: source.factor }
    : { mode: "stored", resolution: source.resolution, statistic: source.statistic };
}
