import { appendFile, mkdir, readdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import { shouldLog, type LogLevel, type StructuredLogEvent } from "@ui-rescale/shared";
import type { LogSink } from "./types";

export interface FileSinkOptions {
  sessionId: string;
  level: LogLevel;
  directory: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
}

const LOG_SUFFIX = ".jsonl";

/**
 * Appends one JSON event per line to `<session>-<ms>-<n>.jsonl` under
 * `directory`. A line that would push the current file past `maxFileSizeMb`
 * starts the next file, and only the newest `maxFiles` log files are kept.
 */
class JsonlFileSink implements LogSink {
  readonly name = "file";
  readonly level: LogLevel;
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private currentFile: string | null = null;
  private currentBytes = 0;
  private fileCount = 0;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly options: FileSinkOptions) {
    this.level = options.level;
    this.maxBytes = Math.max(0.001, options.maxFileSizeMb ?? 25) * 1024 * 1024;
    this.maxFiles = Math.max(1, options.maxFiles ?? 10);
  }

  async start() {
    await mkdir(this.options.directory, { recursive: true });
  }

  async flush() {
    await this.writes;
  }

  async stop() {
    await this.flush();
    this.currentFile = null;
  }

  publish(event: StructuredLogEvent): Promise<void> {
    if (!shouldLog(event.level, this.level)) {
      return Promise.resolve();
    }
    const line = `${JSON.stringify(event)}\n`;
    const write = this.writes.then(() => this.append(line));
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async append(line: string) {
    const size = Buffer.byteLength(line);
    if (!this.currentFile || (this.currentBytes > 0 && this.currentBytes + size > this.maxBytes)) {
      await this.nextFile();
    }
    const target = this.currentFile;
    if (!target) {
      throw new Error("log file was not opened");
    }
    await appendFile(target, line, "utf8");
    this.currentBytes += size;
  }

  private async nextFile() {
    await mkdir(this.options.directory, { recursive: true });
    this.fileCount += 1;
    this.currentFile = path.join(
      this.options.directory,
      `${this.options.sessionId}-${Date.now()}-${this.fileCount}${LOG_SUFFIX}`
    );
    this.currentBytes = 0;
    await appendFile(this.currentFile, "", "utf8");
    await this.prune();
  }

  private async prune() {
    const names = (await readdir(this.options.directory)).filter(name => name.endsWith(LOG_SUFFIX));
    if (names.length <= this.maxFiles) {
      return;
    }
    const files = await Promise.all(
      names.map(async name => {
        const fullPath = path.join(this.options.directory, name);
        return { fullPath, modified: (await stat(fullPath)).mtimeMs };
      })
    );
    files.sort((a, b) => b.modified - a.modified || b.fullPath.localeCompare(a.fullPath));
    for (const file of files.slice(this.maxFiles)) {
      if (file.fullPath !== this.currentFile) {
        await rm(file.fullPath, { force: true });
      }
    }
  }
}

export function createFileSink(options: FileSinkOptions): LogSink {
  return new JsonlFileSink(options);
}
