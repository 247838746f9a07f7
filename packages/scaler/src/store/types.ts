import type {
  AttributeStatistics,
  FactorsByResolution,
  ResolutionLabel,
  ScalingFactorRecord
} from "@ui-rescale/shared";

export interface FileFactorsInput {
  /** Path relative to the scanned root, `/`-separated. */
  relativePath: string;
  filename: string;
  /** Numeric occurrences per attribute, in text order. */
  originalValues: ReadonlyMap<string, readonly number[]>;
  factors: FactorsByResolution;
}

export interface SaveSummary {
  fileId: number;
  properties: number;
  originalValues: number;
  factors: number;
}

/**
 * Persistence for derived factors. The derivation pass is the only writer;
 * scaling passes only read.
 */
export interface ScalingFactorStore {
  /**
   * Writes one file's values and factors atomically. Attributes stored for
   * the file but absent from `input` are removed with their values and factors.
   */
  saveFileFactors(input: FileFactorsInput): SaveSummary;
  getFileFactors(relativePath: string, resolution: ResolutionLabel): Map<string, AttributeStatistics>;
  getOriginalValues(relativePath: string): Map<string, number[]>;
  listFactors(resolution?: ResolutionLabel): ScalingFactorRecord[];
  close(): void;
}
