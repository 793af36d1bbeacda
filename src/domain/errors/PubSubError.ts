export type PubSubErrorCode =
  | "INVALID_TOPIC"
  | "PARTITION_LIMIT_EXCEEDED"
  | "MESSAGE_TOO_LARGE"
  | "BACKLOG_FULL"
  | "PARTITION_CLOSED"
  | "SUBSCRIPTION_CLOSED"
  | "ALREADY_SUBSCRIBED"
  | "DELIVERY_FAILED"
  | "ACK_TIMEOUT"
  | "INVALID_OPTIONS"
  | "ACK_CHANNEL_CLOSED"
  | "ACK_CHANNEL_FULL";

export class PubSubError extends Error {
  constructor(
    readonly code: PubSubErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidTopicError extends PubSubError {
  constructor(readonly topic: unknown) {
    super("INVALID_TOPIC", `Invalid topic name: ${JSON.stringify(topic)}`);
  }
}

export class PartitionLimitExceededError extends PubSubError {
  constructor(readonly limit: number) {
    super(
      "PARTITION_LIMIT_EXCEEDED",
      `Partition limit of ${limit} would be exceeded`
    );
  }
}

export class MessageTooLargeError extends PubSubError {
  constructor(
    readonly size: number,
    readonly maxSize: number
  ) {
    super(
      "MESSAGE_TOO_LARGE",
      `Message of ${size} bytes exceeds the ${maxSize} bytes limit`
    );
  }
}

export class BacklogFullError extends PubSubError {
  constructor(readonly maxBacklog: number) {
    super("BACKLOG_FULL", `Partition backlog is full (${maxBacklog})`);
  }
}

export class PartitionClosedError extends PubSubError {
  constructor(topic: string, partitionId?: number) {
    super(
      "PARTITION_CLOSED",
      partitionId === undefined
        ? `Topic ${topic} is closed`
        : `Partition ${topic}#${partitionId} is closed`
    );
  }
}

export class SubscriptionClosedError extends PubSubError {
  constructor(topic: string, partitionId: number) {
    super(
      "SUBSCRIPTION_CLOSED",
      `Subscription on ${topic}#${partitionId} was closed`
    );
  }
}

export class AlreadySubscribedError extends PubSubError {
  constructor(target: string) {
    super("ALREADY_SUBSCRIBED", `${target} already has a subscriber`);
  }
}

export class DeliveryFailedError extends PubSubError {
  constructor(
    readonly messageId: string,
    readonly attempts: number,
    cause?: Error
  ) {
    super(
      "DELIVERY_FAILED",
      `Message ${messageId} failed after ${attempts} attempts`,
      { cause }
    );
  }
}

export class AckTimeoutError extends PubSubError {
  constructor(
    readonly messageId: string,
    readonly ackTimeoutMs: number
  ) {
    super(
      "ACK_TIMEOUT",
      `Message ${messageId} was not acknowledged within ${ackTimeoutMs}ms`
    );
  }
}

export class InvalidOptionsError extends PubSubError {
  constructor(readonly problems: readonly string[]) {
    super("INVALID_OPTIONS", `Invalid options: ${problems.join("; ")}`);
  }
}

export class AckChannelClosedError extends PubSubError {
  constructor() {
    super("ACK_CHANNEL_CLOSED", "Ack channel is closed");
  }
}

export class AckChannelFullError extends PubSubError {
  constructor(readonly capacity: number) {
    super("ACK_CHANNEL_FULL", `Ack channel is full (${capacity})`);
  }
}
