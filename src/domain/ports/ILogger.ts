import type { ILogDriver } from "./ILogDriver";

export type LogMethod = keyof ILogDriver;

export interface ILogger {
  log(msg: string, extra?: object, level?: LogMethod): void;
  flush: () => void;
  destroy(): void;
}
