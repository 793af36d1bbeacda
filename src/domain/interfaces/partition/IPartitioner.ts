import type { OrderingKey } from "@domain/interfaces/message/IMessageMetadata";
import type { IPartition } from "./IPartition";

export interface IPartitioner {
  partition(topic: string, key: OrderingKey): IPartition;
  partitionId(key: OrderingKey): number;
  close(graceMs?: number): Promise<void>;
}
