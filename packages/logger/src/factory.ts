import type { LogLevel } from "@ui-rescale/shared";
import { StructuredLogger } from "./structuredLogger";
import { createConsoleSink } from "./sinks/consoleSink";
import { createFileSink } from "./sinks/fileSink";
import type { LogSink } from "./sinks/types";
import type { ComponentLogger } from "./types";

export interface RunLoggerOptions {
  sessionId: string;
  component: string;
  level: LogLevel;
  logDir: string;
  console: boolean;
  maxFileSizeMb: number;
  maxFiles: number;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/**
 * Logger for one CLI run: JSONL file sink under `logDir`, plus a
 * human-readable console sink when enabled. Call `start()` before use and
 * `stop()` before exit so pending lines reach the file.
 */
export function createRunLogger(options: RunLoggerOptions): StructuredLogger {
  const sinks: LogSink[] = [
    createFileSink({
      sessionId: options.sessionId,
      level: options.level,
      directory: options.logDir,
      maxFileSizeMb: options.maxFileSizeMb,
      maxFiles: options.maxFiles
    })
  ];
  if (options.console) {
    sinks.push(createConsoleSink({ level: options.level, format: "text", consoleImpl: options.consoleImpl }));
  }
  const warnOutput = options.consoleImpl ?? console;
  return new StructuredLogger({
    sessionId: options.sessionId,
    component: options.component,
    level: options.level,
    sinks,
    onSinkError: (sink, error) => warnOutput.warn(`log sink "${sink}" failed`, error)
  });
}

export const noopLogger: ComponentLogger = {
  log: () => {
    /* noop */
  },
  child: () => noopLogger
};
