import { EMPTY_STATISTICS, type AttributeStatistics } from "@ui-rescale/shared";

function median(sorted: readonly number[]): number {
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Mean, median, population standard deviation, min and max of a ratio list.
 * An empty list yields all-null statistics; a single sample has a standard
 * deviation of 0.
 */
export function describeRatios(ratios: readonly number[]): AttributeStatistics {
  if (ratios.length === 0) {
    return { ...EMPTY_STATISTICS };
  }
  const sorted = [...ratios].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, value) => sum + value, 0) / sorted.length;
  const variance = sorted.length < 2
    ? 0
    : sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / sorted.length;
  return {
    mean,
    median: median(sorted),
    stdDev: Math.sqrt(variance),
    min: sorted[0],
    max: sorted[sorted.length - 1]
  };
}

/**
 * Pairs values by position and returns `scaled[i] / original[i]`, skipping
 * positions where the original is 0. Lists of different length cannot be
 * paired and yield no ratios.
 */
export function pairwiseRatios(original: readonly number[], scaled: readonly number[]): number[] {
  if (original.length !== scaled.length) {
    return [];
  }
  const ratios: number[] = [];
  original.forEach((value, index) => {
    if (value !== 0) {
      ratios.push(scaled[index] / value);
    }
  });
  return ratios;
}

/**
 * Per-attribute ratio statistics between an original and one scaled version.
 * Attributes missing from the scaled version get no entry; attributes whose
 * value counts differ, or whose originals are all 0, get all-null statistics.
 */
export function calculatePropertyScaling(
  original: ReadonlyMap<string, readonly number[]>,
  scaled: ReadonlyMap<string, readonly number[]>
): Record<string, AttributeStatistics> {
  const result: Record<string, AttributeStatistics> = {};
  for (const [name, originalValues] of original) {
    const scaledValues = scaled.get(name);
    if (!scaledValues) {
      continue;
    }
    result[name] = describeRatios(pairwiseRatios(originalValues, scaledValues));
  }
  return result;
}
