export type OrderingKey = string | Uint8Array;

export interface IMessageMetadata {
  messageId?: string;
  timestamp?: number;
  contentType?: string;
  correlationId?: string;
}

export interface IPublishMetadata extends IMessageMetadata {
  /** Overrides the partition's current ordering key for these messages. */
  orderingKey?: OrderingKey | null;
}
