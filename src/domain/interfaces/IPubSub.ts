import type { Message } from "@domain/entities/Message";
import type { OutcomeListener } from "@domain/interfaces/delivery/IDeliveryOutcome";
import type {
  IPublishMetadata,
  OrderingKey,
} from "@domain/interfaces/message/IMessageMetadata";
import type { IPartitioner } from "@domain/interfaces/partition/IPartitioner";
import type { SubscriptionHandler } from "@domain/interfaces/subscription/IBatchConsumer";
import type { ISubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";

export interface IPubSub {
  partitioner(): IPartitioner;
  publish(
    topic: string,
    key: OrderingKey,
    messages: readonly Message[],
    metadata?: IPublishMetadata
  ): Promise<void>;
  subscribe(
    topic: string,
    handler: SubscriptionHandler,
    metadata: unknown,
    options: Partial<ISubscriptionOptions>,
    ackChannel: IAckReceiver
  ): void;
  unsubscribe(topic: string, graceMs?: number): Promise<void>;
  onOutcome(listener: OutcomeListener): () => void;
  close(graceMs?: number): Promise<void>;
}
