import type { FactorStatistic } from "../scaling";
import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export interface LoggingConfig {
  level: LogLevel;
  maxFileSizeMb: number;
  maxFiles: number;
  console: boolean;
}

export interface ScalingConfig {
  /** File extension without the leading dot, e.g. "gui". */
  extension: string;
  statistic: FactorStatistic;
}

export interface DispatchConfig {
  /** Worker count; 0 means one per available CPU. */
  concurrency: number;
}

export interface RescaleConfig {
  logging: LoggingConfig;
  scaling: ScalingConfig;
  dispatch: DispatchConfig;
}

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type FrozenRescaleConfig = DeepReadonly<RescaleConfig>;
