import type { ILogger } from "./ILogger";

export interface ILoggerFactory {
  /** `context` fields are merged into every entry of the new logger. */
  create(label?: string, context?: object): ILogger;
}
