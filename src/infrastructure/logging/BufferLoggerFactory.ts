import type { LogLevel } from "@domain/interfaces/IPubSubConfig";
import type { ILogDriver } from "@domain/ports/ILogDriver";
import type { ILogger } from "@domain/ports/ILogger";
import type { ILoggerFactory } from "@domain/ports/ILoggerFactory";
import { BufferedLogger } from "./BufferedLogger";

export interface IBufferLoggerFactoryOptions {
  chunkSize?: number;
  level?: LogLevel;
}

export class BufferLoggerFactory implements ILoggerFactory {
  private loggers = new Set<ILogger>();

  constructor(
    private driver: ILogDriver,
    private options: IBufferLoggerFactoryOptions = {}
  ) {}

  create(label?: string, context?: object): ILogger {
    const logger = new BufferedLogger(this.driver, {
      ...this.options,
      label,
      context,
    });
    this.loggers.add(logger);
    return logger;
  }

  flushAll() {
    this.loggers.forEach((logger) => logger.flush());
  }

  destroyAll() {
    this.loggers.forEach((logger) => logger.destroy());
    this.loggers.clear();
  }
}
