import type { LogLevel } from "@ui-rescale/shared";

export type LogContext = Record<string, unknown>;

/**
 * What components receive instead of the logger itself: log and derive
 * children, nothing about sinks or lifecycle.
 */
export interface ComponentLogger {
  log(level: LogLevel, event: string, payload?: LogContext): void;
  child(component: string, context?: LogContext): ComponentLogger;
}
