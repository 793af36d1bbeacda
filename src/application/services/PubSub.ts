import { MessageFactory } from "@app/factories/MessageFactory";
import type { Message } from "@domain/entities/Message";
import { PartitionClosedError } from "@domain/errors/PubSubError";
import type { IPubSub } from "@domain/interfaces/IPubSub";
import type { OutcomeListener } from "@domain/interfaces/delivery/IDeliveryOutcome";
import type {
  IMessageMetadata,
  IPublishMetadata,
  OrderingKey,
} from "@domain/interfaces/message/IMessageMetadata";
import type { IPartitioner } from "@domain/interfaces/partition/IPartitioner";
import type { SubscriptionHandler } from "@domain/interfaces/subscription/IBatchConsumer";
import type { ISubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";
import type { ILogger } from "@domain/ports/ILogger";
import type {
  AckChannel,
  AckChannelOverflowPolicy,
} from "@infra/channel/AckChannel";
import type { IDedupLedger } from "./DedupLedger";
import type { DLQManager } from "./DLQManager";
import type { OutcomeNotifier } from "./OutcomeNotifier";
import { assertTopic } from "./Partitioner";
import type { ITopicMetrics } from "./Topic";
import type { TopicRegistry } from "./TopicRegistry";

export interface IPubSubMetrics {
  topics: ITopicMetrics[];
  partitions: number;
  dedup: { size: number };
  dlq: { size: number };
}

export interface IPubSubDeps {
  registry: TopicRegistry;
  partitioner: IPartitioner;
  ledger: IDedupLedger;
  dlq: DLQManager;
  notifier: OutcomeNotifier;
  createAckChannel: (overflow?: AckChannelOverflowPolicy) => AckChannel;
  logger?: ILogger;
  /** Runs last on close, after every partition has drained. */
  onClose?: () => void;
}

export class PubSub implements IPubSub {
  private messageFactory = new MessageFactory();
  private closing?: Promise<void>;

  constructor(private readonly deps: IPubSubDeps) {}

  get isClosed() {
    return this.closing !== undefined;
  }

  get dlq() {
    return this.deps.dlq;
  }

  partitioner(): IPartitioner {
    return this.deps.partitioner;
  }

  /** Builds a message with a generated id unless the metadata names one. */
  createMessage(value: Uint8Array, metadata?: IMessageMetadata): Message {
    return this.messageFactory.create(value, metadata);
  }

  /** A channel sized by `ackChannelCapacity`, to pass to `subscribe`. */
  createAckChannel(overflow?: AckChannelOverflowPolicy): AckChannel {
    return this.deps.createAckChannel(overflow);
  }

  async publish(
    topic: string,
    key: OrderingKey,
    messages: readonly Message[],
    metadata: IPublishMetadata = {}
  ): Promise<void> {
    const partition = this.deps.partitioner.partition(topic, key);
    partition.validate(messages);
    for (const message of messages) {
      await partition.publishMessage(message, metadata.orderingKey);
    }
  }

  subscribe(
    topic: string,
    handler: SubscriptionHandler,
    metadata: unknown,
    options: Partial<ISubscriptionOptions>,
    ackChannel: IAckReceiver
  ): void {
    assertTopic(topic);
    if (this.isClosed) throw new PartitionClosedError(topic);

    this.deps.registry
      .getOrCreate(topic)
      .subscribe(handler, metadata, options, ackChannel);
  }

  async unsubscribe(topic: string, graceMs?: number) {
    assertTopic(topic);
    await this.deps.registry.get(topic)?.unsubscribe(graceMs);
  }

  onOutcome(listener: OutcomeListener) {
    return this.deps.notifier.add(listener);
  }

  getMetrics(): IPubSubMetrics {
    const { registry, ledger, dlq } = this.deps;
    return {
      topics: Array.from(registry.values(), (topic) => topic.getMetrics()),
      partitions: registry.partitionCount,
      dedup: { size: ledger.size },
      dlq: { size: dlq.size },
    };
  }

  close(graceMs?: number): Promise<void> {
    this.closing ??= this.shutdown(graceMs);
    return this.closing;
  }

  private async shutdown(graceMs?: number) {
    const { partitioner, logger } = this.deps;
    logger?.log("Closing pubsub.", { partitions: this.deps.registry.partitionCount });

    await partitioner.close(graceMs);

    logger?.log("Pubsub is closed.", this.getMetrics().dlq);
    this.deps.notifier.clear();
    this.deps.onClose?.();
  }
}
