import type { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import type { AckMessage } from "@domain/entities/AckMessage";
import { AlreadySubscribedError } from "@domain/errors/PubSubError";
import type {
  IPartition,
  IPartitionMetrics,
} from "@domain/interfaces/partition/IPartition";
import type { SubscriptionHandler } from "@domain/interfaces/subscription/IBatchConsumer";
import type {
  IResolvedSubscriptionOptions,
  ISubscriptionOptions,
} from "@domain/interfaces/subscription/ISubscriptionOptions";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";
import type { ILogger } from "@domain/ports/ILogger";
import { toError } from "@domain/utils/errors";

export interface ITopicMetrics {
  name: string;
  partitions: IPartitionMetrics[];
}

interface ITopicSubscription {
  handler: SubscriptionHandler;
  metadata: unknown;
  options: IResolvedSubscriptionOptions;
  abort: AbortController;
  ackLoop: Promise<void>;
}

/** Partitions of one topic plus the optional topic-wide subscription. */
export class Topic {
  private partitions = new Map<number, IPartition>();
  private subscription?: ITopicSubscription;

  constructor(
    readonly name: string,
    private readonly optionsValidator: SubscriptionOptionsValidator,
    private readonly logger?: ILogger
  ) {}

  get(partitionId: number) {
    return this.partitions.get(partitionId);
  }

  /** Adopts a new partition, attaching the topic-wide handler if any. */
  add(partition: IPartition) {
    this.partitions.set(partition.id, partition);

    const subscription = this.subscription;
    if (subscription) {
      partition.subscribe(
        subscription.handler,
        subscription.metadata,
        subscription.options
      );
    }
  }

  subscribe(
    handler: SubscriptionHandler,
    metadata: unknown,
    options: Partial<ISubscriptionOptions>,
    ackChannel: IAckReceiver
  ) {
    const live = Array.from(this.partitions.values()).filter(
      (p) => p.state !== "closed"
    );
    if (this.subscription || live.some((p) => p.isSubscribed)) {
      throw new AlreadySubscribedError(`Topic ${this.name}`);
    }

    // closed partitions stay closed; the others get the handler
    const partitions = live.filter((p) => p.state === "open");
    const resolved = this.optionsValidator.resolve(options);
    partitions.forEach((p) => p.subscribe(handler, metadata, resolved));

    const abort = new AbortController();
    this.subscription = {
      handler,
      metadata,
      options: resolved,
      abort,
      ackLoop: this.consumeAcks(ackChannel, abort.signal),
    };

    this.logger?.log(`Subscribed to topic ${this.name}.`, {
      metadata,
      partitions: partitions.length,
    });
  }

  /**
   * Detaches the topic-wide handler, or every direct subscriber when there
   * is none. Acks keep flowing until all partitions have drained.
   */
  async unsubscribe(graceMs?: number) {
    const subscription = this.subscription;
    this.subscription = undefined;

    const subscribed = Array.from(this.partitions.values()).filter(
      (p) => p.isSubscribed
    );
    await Promise.all(subscribed.map((p) => p.unsubscribe(graceMs)));

    if (subscription) {
      subscription.abort.abort();
      await subscription.ackLoop;
      this.logger?.log(`Unsubscribed from topic ${this.name}.`, {
        metadata: subscription.metadata,
      });
    }
  }

  async close(graceMs?: number) {
    const subscription = this.subscription;
    this.subscription = undefined;

    await Promise.all(
      Array.from(this.partitions.values(), (p) => p.close(graceMs))
    );

    if (subscription) {
      subscription.abort.abort();
      await subscription.ackLoop;
    }
  }

  getMetrics(): ITopicMetrics {
    return {
      name: this.name,
      partitions: Array.from(this.partitions.values(), (p) => p.getMetrics()),
    };
  }

  private async consumeAcks(channel: IAckReceiver, signal: AbortSignal) {
    for (;;) {
      const result = await channel.take(signal);
      if (result.done) return;

      try {
        this.routeAck(result.value);
      } catch (error) {
        this.logger?.log(
          "Ack resolution failed.",
          { messageId: result.value.messageId, error: toError(error).message },
          "error"
        );
      }
    }
  }

  private routeAck(ack: AckMessage) {
    for (const partition of this.partitions.values()) {
      if (partition.isTracking(ack.messageId)) {
        partition.acknowledge(ack);
        return;
      }
    }

    this.logger?.log(
      "Ack for an untracked message is ignored.",
      { topic: this.name, messageId: ack.messageId },
      "debug"
    );
  }
}
