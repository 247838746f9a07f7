export * from "./types";
export { StructuredLogger } from "./structuredLogger";
export type { StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatTextLine } from "./sinks/consoleSink";
export type { ConsoleFormat } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export type { FileSinkOptions } from "./sinks/fileSink";
export { createRunLogger, noopLogger } from "./factory";
export type { RunLoggerOptions } from "./factory";
export type { LogSink } from "./sinks/types";
