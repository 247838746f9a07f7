export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
};

export type EnvCommand = "scale" | "derive" | "apply" | "search" | "factors";

const SHARED_OPTIONAL = ["RESCALE_CONFIG", "RESCALE_LOG_LEVEL", "RESCALE_SESSION_ID"];

export const ENV_SCHEMAS: Record<EnvCommand, EnvSchema> = {
  scale: {
    required: ["RESCALE_LOG_DIR"],
    optional: SHARED_OPTIONAL,
    allowEmpty: ["RESCALE_SESSION_ID"]
  },
  derive: {
    required: ["RESCALE_LOG_DIR", "RESCALE_DB_PATH"],
    optional: SHARED_OPTIONAL,
    allowEmpty: ["RESCALE_SESSION_ID"]
  },
  apply: {
    required: ["RESCALE_LOG_DIR", "RESCALE_DB_PATH"],
    optional: SHARED_OPTIONAL,
    allowEmpty: ["RESCALE_SESSION_ID"]
  },
  search: {
    required: ["RESCALE_LOG_DIR"],
    optional: SHARED_OPTIONAL
  },
  factors: {
    required: ["RESCALE_LOG_DIR", "RESCALE_DB_PATH"],
    optional: SHARED_OPTIONAL
  }
};
