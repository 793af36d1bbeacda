import type { LogLevel } from "@domain/interfaces/IPubSubConfig";
import type { ILogDriver } from "@domain/ports/ILogDriver";
import type { ILogger, LogMethod } from "@domain/ports/ILogger";

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

type LogEntry = [msg: string, extra: object, level: LogMethod];

export interface IBufferedLoggerOptions {
  /** Entries written per tick. */
  chunkSize?: number;
  label?: string;
  /** Entries below this level are dropped before buffering. */
  level?: LogLevel;
  /** Fields merged into every entry, e.g. the partition's topic and id. */
  context?: object;
}

export class BufferedLogger implements ILogger {
  private flushId?: NodeJS.Immediate;
  private buffer: LogEntry[] = [];
  private destroyed = false;
  private readonly chunkSize: number;
  private readonly minRank: number;

  constructor(
    private driver: ILogDriver,
    private options: IBufferedLoggerOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? 50;
    this.minRank = LEVEL_RANK[options.level ?? "trace"];
  }

  log(msg: string, extra?: object, level: LogMethod = "info") {
    if (this.destroyed || LEVEL_RANK[level] < this.minRank) return;

    this.buffer.push([msg, { ...this.options.context, ...extra }, level]);
    this.scheduleFlush();
  }

  private scheduleFlush() {
    this.flushId ??= setImmediate(this.flush);
  }

  flush = () => {
    if (this.flushId) clearImmediate(this.flushId);
    this.flushId = undefined;

    const ts = Date.now();
    const { label } = this.options;
    for (const [msg, extra, level] of this.buffer.splice(0, this.chunkSize)) {
      this.driver[level]?.(msg, { ...extra, label, ts });
    }

    if (this.buffer.length > 0) {
      this.scheduleFlush();
    }
  };

  destroy() {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    this.buffer = [];
    this.destroyed = true;
  }
}
