import { resolveConfig } from "@app/config/PubSubConfig";
import { DedupLedger } from "@app/services/DedupLedger";
import { DLQManager } from "@app/services/DLQManager";
import { OutcomeNotifier } from "@app/services/OutcomeNotifier";
import type { OutcomeSink } from "@app/services/Partition";
import { Partitioner } from "@app/services/Partitioner";
import { PubSub } from "@app/services/PubSub";
import { TopicRegistry } from "@app/services/TopicRegistry";
import { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import type { IPubSubConfig } from "@domain/interfaces/IPubSubConfig";
import type { IHasher } from "@domain/ports/IHasher";
import type { ILogDriver } from "@domain/ports/ILogDriver";
import { AckChannel } from "@infra/channel/AckChannel";
import { SHA256Hasher } from "@infra/hash/SHA256Hasher";
import { BufferLoggerFactory } from "@infra/logging/BufferLoggerFactory";
import { createLogDriver } from "@infra/logging/PinoLogDriver";
import { PartitionFactory } from "./PartitionFactory";

export interface IPubSubFactoryDeps {
  /** Defaults to a pino driver built from `logLevel` and `logPretty`. */
  logDriver?: ILogDriver;
  hasher?: IHasher;
}

export function createPubSub(
  config: Partial<IPubSubConfig> = {},
  deps: IPubSubFactoryDeps = {}
): PubSub {
  const resolved = resolveConfig(config);

  const logDriver =
    deps.logDriver ??
    createLogDriver({ level: resolved.logLevel, pretty: resolved.logPretty });
  const loggerFactory = new BufferLoggerFactory(logDriver, {
    chunkSize: resolved.logBufferSize,
    level: resolved.logLevel,
  });
  const logger = loggerFactory.create("pubsub");

  const ledger = new DedupLedger(
    resolved.dedupRetentionMs,
    resolved.dedupMaxEntries
  );
  const dlq = new DLQManager(undefined, loggerFactory.create("dlq"));
  const notifier = new OutcomeNotifier(logger);

  const sink: OutcomeSink = (outcome, message) => {
    notifier.emit(outcome);
    if (outcome.status !== "failed" && outcome.status !== "closed") return;

    dlq.enqueue({
      reason: outcome.status === "failed" ? "max_retries" : "closed",
      message,
      topic: outcome.topic,
      partitionId: outcome.partitionId,
      attempts: outcome.attempts,
      error: outcome.error,
    });
  };

  const optionsValidator = new SubscriptionOptionsValidator(
    resolved.maxMessageSize
  );
  const partitionFactory = new PartitionFactory(
    resolved,
    ledger,
    optionsValidator,
    loggerFactory,
    sink
  );
  const registry = new TopicRegistry(
    resolved.maxPartitions,
    partitionFactory,
    optionsValidator,
    logger
  );
  const partitioner = new Partitioner(
    registry,
    deps.hasher ?? new SHA256Hasher(),
    resolved.partitionCount
  );

  logger.log("Pubsub is created.", { ...resolved });

  return new PubSub({
    registry,
    partitioner,
    ledger,
    dlq,
    notifier,
    logger,
    createAckChannel: (overflow) =>
      new AckChannel(resolved.ackChannelCapacity, overflow),
    onClose: () => {
      loggerFactory.flushAll();
      loggerFactory.destroyAll();
    },
  });
}
