import type { DeliveryGuarantee } from "./DeliveryGuarantee";

export interface ISubscriptionOptions {
  /** Largest accepted payload in bytes, checked at publish time. */
  maxMessageSize: number;
  ackTimeoutMs: number;
  deliveryGuarantee: DeliveryGuarantee;
  maxRetries: number;
  /** Backoff before redelivering after a handler-reported failure. */
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  maxBatchSize?: number;
}

export type IResolvedSubscriptionOptions = Required<ISubscriptionOptions>;
