import { createStructuredEvent, shouldLog, type LogLevel, type StructuredLogEvent } from "@ui-rescale/shared";
import type { LogSink } from "./sinks/types";
import type { ComponentLogger, LogContext } from "./types";

export interface StructuredLoggerOptions {
  sessionId: string;
  component: string;
  level: LogLevel;
  sinks: LogSink[];
  context?: LogContext;
  /** Receives sink failures. Defaults to `console.warn`. */
  onSinkError?: (sink: string, error: unknown) => void;
}

type Emit = (component: string, level: LogLevel, event: string, payload: LogContext) => void;

class ScopedLogger implements ComponentLogger {
  constructor(
    private readonly emit: Emit,
    private readonly component: string,
    private readonly context: LogContext
  ) {}

  log(level: LogLevel, event: string, payload?: LogContext) {
    this.emit(this.component, level, event, { ...this.context, ...payload });
  }

  child(component: string, context?: LogContext): ComponentLogger {
    return new ScopedLogger(this.emit, component, { ...this.context, ...context });
  }
}

/**
 * Fans events out to every sink in the order they were logged. `log` never
 * blocks or throws; `flush` waits for everything logged so far.
 */
export class StructuredLogger implements ComponentLogger {
  private delivered: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly root: ScopedLogger;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.root = new ScopedLogger(
      (component, level, event, payload) => this.emit(component, level, event, payload),
      options.component,
      options.context ?? {}
    );
  }

  async start() {
    for (const sink of this.options.sinks) {
      await sink.start?.();
    }
  }

  async flush() {
    await this.delivered;
    for (const sink of this.options.sinks) {
      await sink.flush?.();
    }
  }

  /** Flushes, then closes every sink. Later events are dropped. */
  async stop() {
    await this.flush();
    this.closed = true;
    for (const sink of this.options.sinks) {
      await sink.stop?.();
    }
  }

  log(level: LogLevel, event: string, payload?: LogContext) {
    this.root.log(level, event, payload);
  }

  child(component: string, context?: LogContext): ComponentLogger {
    return this.root.child(component, context);
  }

  private emit(component: string, level: LogLevel, event: string, payload: LogContext) {
    if (this.closed || !shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      sessionId: this.options.sessionId,
      component,
      level,
      event,
      payload
    });
    this.delivered = this.delivered.then(() => this.publish(structured));
  }

  private async publish(event: StructuredLogEvent) {
    const report = this.options.onSinkError ?? ((sink: string, error: unknown) => {
      console.warn(`log sink "${sink}" failed`, error);
    });
    await Promise.all(
      this.options.sinks.map(sink =>
        sink.publish(event).catch((error: unknown) => {
          report(sink.name, error);
        })
      )
    );
  }
}
