import type { LogLevel } from "@domain/interfaces/IPubSubConfig";
import type { ILogDriver } from "@domain/ports/ILogDriver";
import pino, { type Logger, type LoggerOptions } from "pino";

export interface IPinoDriverOptions {
  level: LogLevel;
  pretty?: boolean;
  serviceName?: string;
}

export class PinoLogDriver implements ILogDriver {
  constructor(private logger: Logger) {}

  info(msg: string, extra?: unknown) {
    this.logger.info(extra ?? {}, msg);
  }

  warn(msg: string, extra?: unknown) {
    this.logger.warn(extra ?? {}, msg);
  }

  error(msg: string, extra?: unknown) {
    this.logger.error(extra ?? {}, msg);
  }

  debug(msg: string, extra?: unknown) {
    this.logger.debug(extra ?? {}, msg);
  }
}

export function createLogDriver({
  level,
  pretty = false,
  serviceName = "pubsub",
}: IPinoDriverOptions): PinoLogDriver {
  const options: LoggerOptions = {
    level,
    base: { service: serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    return new PinoLogDriver(
      pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, ignore: "pid,hostname" },
        },
      })
    );
  }

  return new PinoLogDriver(pino(options));
}
