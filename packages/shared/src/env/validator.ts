import type { EnvCommand } from "./schema";
import { ENV_SCHEMAS } from "./schema";

export type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends Error {
  constructor(command: EnvCommand, public readonly missing: string[]) {
    super(
      `[env] Missing required environment variables for ${command}: ${[...missing]
        .sort()
        .join(", ")}`
    );
    this.name = "EnvValidationError";
  }
}

export function getMissingEnvVars(command: EnvCommand, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[command];

  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined) {
      return true;
    }

    if (schema.allowEmpty?.includes(key)) {
      return false;
    }

    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }

    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

export function assertEnvVars(command: EnvCommand, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(command, source);
  if (missing.length) {
    throw new EnvValidationError(command, missing);
  }
}

/**
 * Returns a trimmed optional variable, treating blanks and placeholders as unset.
 */
export function readOptionalEnv(key: string, source: EnvSource = process.env): string | undefined {
  const value = source[key]?.trim();
  if (!value || PLACEHOLDER_PATTERNS.some(pattern => pattern.test(value))) {
    return undefined;
  }
  return value;
}
