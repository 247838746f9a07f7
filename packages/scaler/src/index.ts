export * from "./errors";
export * from "./matcher/attributes";
export * from "./scaling/valueScaler";
export * from "./scaling/factorSource";
export * from "./io/textFile";
export * from "./rescale/fileRescaler";
export * from "./derivation/statistics";
export * from "./derivation/extract";
export * from "./derivation/engine";
export * from "./store/types";
export { SqliteScalingFactorStore } from "./store/sqliteStore";
export * from "./dispatch/pool";
export * from "./pipeline";
export * from "./search/textSearch";
export { createSessionId, parseReferences, runCommand } from "./cli/runtime";
export type { CommandWork, RunCommandOptions, RunContext } from "./cli/runtime";
