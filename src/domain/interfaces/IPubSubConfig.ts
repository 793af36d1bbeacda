export type BacklogPolicy = "reject" | "block";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface IPubSubConfig {
  /** Hash slots per topic. */
  partitionCount: number;
  /** Materialized partitions allowed across all topics. */
  maxPartitions: number;
  maxBacklog: number;
  backlogPolicy: BacklogPolicy;
  maxMessageSize: number;
  sweepIntervalMs: number;
  closeGracePeriodMs: number;
  dedupRetentionMs: number;
  dedupMaxEntries: number;
  ackChannelCapacity: number;
  logLevel: LogLevel;
  logPretty: boolean;
  logBufferSize: number;
}
