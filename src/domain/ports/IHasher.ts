import type { OrderingKey } from "@domain/interfaces/message/IMessageMetadata";

export interface IHasher {
  hash(key: OrderingKey): number;
}
