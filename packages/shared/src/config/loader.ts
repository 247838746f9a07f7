import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchemaObject } from "ajv";
import type { FrozenRescaleConfig, RescaleConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(__dirname, "../../../../config/schema/rescale-config.schema.json");
export const defaultConfigPath = path.resolve(__dirname, "../../../../config/rescale/default.rescale.json");

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[], source?: string) {
    super(`Config validation failed${source ? ` for ${source}` : ""}:\n${errors.join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

function compileSchema(schemaFilePath: string) {
  const schema: AnySchemaObject = JSON.parse(fs.readFileSync(schemaFilePath, "utf-8"));
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return ajv.compile<RescaleConfig>(schema);
}

/**
 * Validates config and returns structured result without throwing.
 * @param config - Configuration object to validate
 * @param schemaFilePath - Path to JSON schema file
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const validateFn = compileSchema(schemaFilePath);
  if (!validateFn(config)) {
    const errors = validateFn.errors?.map(err => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`) ?? [];
    return { valid: false, errors };
  }
  return { valid: true };
}

/**
 * Validates config and throws a ConfigValidationError listing every schema violation.
 */
export function validate(
  config: unknown,
  schemaFilePath: string = defaultSchemaPath,
  source?: string
): asserts config is RescaleConfig {
  const result = validateConfig(config, schemaFilePath);
  if (!result.valid) {
    throw new ConfigValidationError(result.errors ?? [], source);
  }
}

/**
 * Reads, validates and freezes a config file. The returned object is passed by
 * reference to every component of a run and cannot be mutated.
 */
export function loadConfig(
  filePath: string = defaultConfigPath,
  schemaFilePath: string = defaultSchemaPath
): FrozenRescaleConfig {
  const cfg: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  validate(cfg, schemaFilePath, filePath);
  return deepFreeze(cfg);
}

export function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
