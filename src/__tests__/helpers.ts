import { resolveConfig } from "@app/config/PubSubConfig";
import { DedupLedger } from "@app/services/DedupLedger";
import { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import { Message } from "@domain/entities/Message";
import type { IPubSubConfig } from "@domain/interfaces/IPubSubConfig";
import type { IDeliveryOutcome } from "@domain/interfaces/delivery/IDeliveryOutcome";
import type { IPartition } from "@domain/interfaces/partition/IPartition";
import type { ILogDriver } from "@domain/ports/ILogDriver";
import { PartitionFactory } from "@infra/factories/PartitionFactory";
import { vi } from "vitest";

export interface ILogEntry {
  level: "info" | "warn" | "error" | "debug";
  msg: string;
  extra: unknown;
}

export function createRecordingDriver() {
  const entries: ILogEntry[] = [];
  const driver: ILogDriver = {
    info: (msg, extra) => entries.push({ level: "info", msg, extra }),
    warn: (msg, extra) => entries.push({ level: "warn", msg, extra }),
    error: (msg, extra) => entries.push({ level: "error", msg, extra }),
    debug: (msg, extra) => entries.push({ level: "debug", msg, extra }),
  };
  return { driver, entries };
}

export const bytes = (text: string) => new TextEncoder().encode(text);

export const message = (messageId: string, text = messageId) =>
  new Message({ value: bytes(text), messageId });

export const ids = (batch: readonly Message[]) => batch.map((m) => m.messageId);

/** Runs queued microtasks and timers due now. */
export const flush = () => vi.advanceTimersByTimeAsync(0);

export function makePartition(
  overrides: Partial<IPubSubConfig> = {},
  topic = "orders",
  partitionId = 0
) {
  const config = resolveConfig({
    sweepIntervalMs: 10,
    closeGracePeriodMs: 50,
    ...overrides,
  });
  const ledger = new DedupLedger(
    config.dedupRetentionMs,
    config.dedupMaxEntries
  );
  const factory = new PartitionFactory(
    config,
    ledger,
    new SubscriptionOptionsValidator(config.maxMessageSize)
  );
  const partition = factory.create(topic, partitionId);
  const outcomes: IDeliveryOutcome[] = [];
  partition.onOutcome((outcome) => outcomes.push(outcome));

  return { partition, ledger, config, outcomes };
}

export function recordBatches() {
  const calls: string[][] = [];
  const handler = (batch: readonly Message[]) => {
    calls.push(ids(batch));
  };
  return { calls, handler };
}

export function ackAll(partition: IPartition, messageIds: string[]) {
  return messageIds.map((messageId) => partition.acknowledge({ messageId }));
}
