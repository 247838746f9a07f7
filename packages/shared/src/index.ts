export * from "./observability";
export * from "./scaling";
export * from "./env/validator";
export * from "./env/schema";
export {
  ConfigValidationError,
  deepFreeze,
  defaultConfigPath,
  defaultSchemaPath,
  loadConfig,
  validate,
  validateConfig
} from "./config/loader";
export type {
  DeepReadonly,
  DispatchConfig,
  FrozenRescaleConfig,
  LoggingConfig,
  RescaleConfig,
  ScalingConfig,
  ValidationResult
} from "./config/types";
