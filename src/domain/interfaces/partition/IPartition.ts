import type { AckMessage } from "@domain/entities/AckMessage";
import type { Message } from "@domain/entities/Message";
import type {
  IMessageMetadata,
  OrderingKey,
} from "@domain/interfaces/message/IMessageMetadata";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";
import type { OutcomeListener } from "@domain/interfaces/delivery/IDeliveryOutcome";
import type { SubscriptionHandler } from "@domain/interfaces/subscription/IBatchConsumer";
import type { ISubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";

export type PartitionState = "open" | "draining" | "closed";

export interface IPartitionMetrics {
  topic: string;
  id: number;
  state: PartitionState;
  subscribed: boolean;
  backlog: number;
  inFlight: number;
  lanes: number;
  published: number;
  delivered: number;
  acked: number;
  failed: number;
  redelivered: number;
}

export interface IPartition {
  readonly topic: string;
  readonly id: number;
  readonly state: PartitionState;
  readonly isSubscribed: boolean;
  subscribe(
    handler: SubscriptionHandler,
    metadata: unknown,
    options: Partial<ISubscriptionOptions>,
    ackChannel?: IAckReceiver
  ): void;
  unsubscribe(graceMs?: number): Promise<void>;
  publish(
    value: Uint8Array,
    metadata?: IMessageMetadata,
    orderingKey?: OrderingKey | null
  ): Promise<Message>;
  publishMessage(message: Message, orderingKey?: OrderingKey | null): Promise<void>;
  /** Throws for the first message that could not be published. */
  validate(messages: readonly Message[]): void;
  setOrderingKey(orderingKey: OrderingKey | null): void;
  /** Resolves an ack for a message this partition tracks; false otherwise. */
  acknowledge(ack: AckMessage): boolean;
  isTracking(messageId: string): boolean;
  onOutcome(listener: OutcomeListener): () => void;
  close(graceMs?: number): Promise<void>;
  getMetrics(): IPartitionMetrics;
}
