import path from "node:path";
import { nanoid } from "nanoid";
import {
  LogLevel,
  assertEnvVars,
  defaultConfigPath,
  loadConfig,
  parseLogLevel,
  readOptionalEnv,
  serializeError,
  type EnvCommand,
  type EnvSource,
  type FrozenRescaleConfig,
  type ResolutionLabel
} from "@ui-rescale/shared";
import { createRunLogger, type StructuredLogger } from "@ui-rescale/logger";
import { InvalidReferenceError, SetupError, errorMessage } from "../errors";
import { SqliteScalingFactorStore } from "../store/sqliteStore";

export interface RunContext {
  command: EnvCommand;
  config: FrozenRescaleConfig;
  logger: StructuredLogger;
  env: EnvSource;
  /** Opens the factor store at `RESCALE_DB_PATH`; closed when the run ends. */
  openStore(): SqliteScalingFactorStore;
}

export interface RunCommandOptions {
  env?: EnvSource;
  errorOutput?: Pick<Console, "error">;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export type CommandWork = (context: RunContext) => Promise<boolean>;

export function createSessionId(env: EnvSource): string {
  return readOptionalEnv("RESCALE_SESSION_ID", env) ?? `rescale-${nanoid(10)}`;
}

/** Parses repeated `LABEL=DIRECTORY` arguments into a label-to-directory map. */
export function parseReferences(values: readonly string[]): Record<ResolutionLabel, string> {
  const references: Record<ResolutionLabel, string> = {};
  for (const value of values) {
    const separator = value.indexOf("=");
    const label = value.slice(0, separator).trim();
    const directory = value.slice(separator + 1).trim();
    if (separator <= 0 || !label || !directory) {
      throw new InvalidReferenceError(value);
    }
    references[label] = path.resolve(directory);
  }
  if (!Object.keys(references).length) {
    throw new InvalidReferenceError(values.join(" "));
  }
  return references;
}

/**
 * Validates the environment, loads config and runs `work` with a started
 * logger. Resolves to the process exit code: 0 when `work` reports success,
 * 1 on a setup error, a failed file or any other error.
 */
export async function runCommand(
  command: EnvCommand,
  work: CommandWork,
  options: RunCommandOptions = {}
): Promise<number> {
  const env = options.env ?? process.env;
  const errorOutput = options.errorOutput ?? console;

  let config: FrozenRescaleConfig;
  try {
    assertEnvVars(command, env);
    config = loadConfig(readOptionalEnv("RESCALE_CONFIG", env) ?? defaultConfigPath);
  } catch (error) {
    errorOutput.error(errorMessage(error));
    return 1;
  }

  const logger = createRunLogger({
    sessionId: createSessionId(env),
    component: "cli",
    level: parseLogLevel(readOptionalEnv("RESCALE_LOG_LEVEL", env), config.logging.level),
    logDir: path.resolve(env.RESCALE_LOG_DIR ?? "logs"),
    console: config.logging.console,
    maxFileSizeMb: config.logging.maxFileSizeMb,
    maxFiles: config.logging.maxFiles,
    consoleImpl: options.consoleImpl
  });
  await logger.start();

  const stores: SqliteScalingFactorStore[] = [];
  const context: RunContext = {
    command,
    config,
    logger,
    env,
    openStore: () => {
      const store = new SqliteScalingFactorStore(path.resolve(env.RESCALE_DB_PATH ?? "rescale.db"));
      stores.push(store);
      return store;
    }
  };

  logger.log(LogLevel.INFO, "command.started", { command });
  let exitCode: number;
  try {
    exitCode = (await work(context)) ? 0 : 1;
    logger.log(exitCode ? LogLevel.WARN : LogLevel.INFO, "command.completed", { command, exitCode });
  } catch (error) {
    const level = error instanceof SetupError ? LogLevel.ERROR : LogLevel.CRITICAL;
    logger.log(level, "command.failed", { command, error: serializeError(error) });
    errorOutput.error(errorMessage(error));
    exitCode = 1;
  } finally {
    for (const store of stores) {
      store.close();
    }
    await logger.stop();
  }
  return exitCode;
}
