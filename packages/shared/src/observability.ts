export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? fallback;
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  sessionId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
}

interface StructuredEventOptions<TPayload> {
  sessionId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  timestamp?: number;
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    sessionId: options.sessionId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload
  };
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  cause?: SerializedError | string;
}

/**
 * Flattens an unknown thrown value into a JSON-safe shape, keeping the stack
 * and walking `cause` chains.
 */
export function serializeError(error: unknown, depth = 0): SerializedError {
  if (!(error instanceof Error)) {
    return { name: "NonError", message: String(error) };
  }
  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack
  };
  if ("code" in error && typeof error.code === "string") {
    serialized.code = error.code;
  }
  if (error.cause !== undefined) {
    serialized.cause = depth < 3 ? serializeError(error.cause, depth + 1) : String(error.cause);
  }
  return serialized;
}
