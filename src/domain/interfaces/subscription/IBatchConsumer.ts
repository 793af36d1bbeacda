import type { Message } from "@domain/entities/Message";

export interface IBatchConsumer {
  deliver(batch: readonly Message[]): void | Promise<void>;
}

export type BatchHandler = (batch: readonly Message[]) => void | Promise<void>;

export type SubscriptionHandler = IBatchConsumer | BatchHandler;
