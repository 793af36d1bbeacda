import type { HandlerInvocation } from "./HandlerInvocation";
import type { Message } from "./Message";

export type DeliveryStatus =
  | "in_flight"
  | "retry_scheduled"
  | "awaiting_settlement";

export class PendingDelivery {
  attempts = 0;
  failures = 0;
  deadline = 0;
  retryDelayMs = 0;
  status: DeliveryStatus = "in_flight";
  invocation?: HandlerInvocation;
  lastError?: Error;

  constructor(
    readonly message: Message,
    readonly topic: string,
    readonly partitionId: number,
    readonly orderingKey: string,
    readonly seq: number,
    readonly subscriber?: unknown
  ) {}

  get messageId() {
    return this.message.messageId;
  }
}
