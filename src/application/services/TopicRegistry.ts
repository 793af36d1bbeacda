import type { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import { PartitionLimitExceededError } from "@domain/errors/PubSubError";
import type { IPartition } from "@domain/interfaces/partition/IPartition";
import type { ILogger } from "@domain/ports/ILogger";
import type { IPartitionFactory } from "@infra/factories/PartitionFactory";
import { Topic } from "./Topic";

/**
 * Arena of topics and their materialized partitions. Lookup-or-create runs
 * to completion without yielding, so concurrent callers for the same
 * partition id always get the same instance.
 */
export class TopicRegistry {
  private topics = new Map<string, Topic>();
  private partitionTotal = 0;

  constructor(
    private readonly maxPartitions: number,
    private readonly partitionFactory: IPartitionFactory,
    private readonly optionsValidator: SubscriptionOptionsValidator,
    private readonly logger?: ILogger
  ) {}

  get partitionCount() {
    return this.partitionTotal;
  }

  get(name: string): Topic | undefined {
    return this.topics.get(name);
  }

  values() {
    return this.topics.values();
  }

  getOrCreate(name: string): Topic {
    let topic = this.topics.get(name);
    if (!topic) {
      topic = new Topic(name, this.optionsValidator, this.logger);
      this.topics.set(name, topic);
      this.logger?.log("Topic created.", { name });
    }
    return topic;
  }

  getOrCreatePartition(name: string, partitionId: number): IPartition {
    const existing = this.topics.get(name)?.get(partitionId);
    if (existing) return existing;

    if (this.partitionTotal >= this.maxPartitions) {
      throw new PartitionLimitExceededError(this.maxPartitions);
    }

    const topic = this.getOrCreate(name);
    const partition = this.partitionFactory.create(name, partitionId);
    this.partitionTotal++;
    topic.add(partition);

    this.logger?.log("Partition created.", {
      topic: name,
      partitionId,
      total: this.partitionTotal,
    });

    return partition;
  }

  async close(graceMs?: number) {
    await Promise.all(
      Array.from(this.topics.values(), (topic) => topic.close(graceMs))
    );
  }
}
