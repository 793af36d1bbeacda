import {
  InvalidTopicError,
  PartitionClosedError,
} from "@domain/errors/PubSubError";
import type { OrderingKey } from "@domain/interfaces/message/IMessageMetadata";
import type { IPartition } from "@domain/interfaces/partition/IPartition";
import type { IPartitioner } from "@domain/interfaces/partition/IPartitioner";
import type { IHasher } from "@domain/ports/IHasher";
import type { TopicRegistry } from "./TopicRegistry";

export function assertTopic(topic: unknown): asserts topic is string {
  if (typeof topic !== "string" || topic.length === 0) {
    throw new InvalidTopicError(topic);
  }
}

export class Partitioner implements IPartitioner {
  private closing?: Promise<void>;

  constructor(
    private readonly registry: TopicRegistry,
    private readonly hasher: IHasher,
    private readonly partitionCount: number
  ) {}

  partition(topic: string, key: OrderingKey): IPartition {
    assertTopic(topic);
    const partitionId = this.partitionId(key);
    if (this.closing) throw new PartitionClosedError(topic, partitionId);
    return this.registry.getOrCreatePartition(topic, partitionId);
  }

  partitionId(key: OrderingKey) {
    return this.hasher.hash(key) % this.partitionCount;
  }

  close(graceMs?: number) {
    this.closing ??= this.registry.close(graceMs);
    return this.closing;
  }
}
