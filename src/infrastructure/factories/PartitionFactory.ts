import type { IDedupLedger } from "@app/services/DedupLedger";
import { Partition, type OutcomeSink } from "@app/services/Partition";
import type { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import type { IPubSubConfig } from "@domain/interfaces/IPubSubConfig";
import type { IPartition } from "@domain/interfaces/partition/IPartition";
import type { ILoggerFactory } from "@domain/ports/ILoggerFactory";
import { BinaryHeapPriorityQueue } from "@infra/queue/BinaryHeapPriorityQueue";
import { TimeoutScheduler } from "@infra/scheduling/TimeoutScheduler";

export interface IPartitionFactory {
  create(topic: string, partitionId: number): IPartition;
}

export class PartitionFactory implements IPartitionFactory {
  constructor(
    private config: IPubSubConfig,
    private ledger: IDedupLedger,
    private optionsValidator: SubscriptionOptionsValidator,
    private loggerFactory?: ILoggerFactory,
    private sink?: OutcomeSink
  ) {}

  create(topic: string, partitionId: number): IPartition {
    return new Partition(topic, partitionId, {
      config: this.config,
      ledger: this.ledger,
      optionsValidator: this.optionsValidator,
      createScheduler: () =>
        new TimeoutScheduler(new BinaryHeapPriorityQueue<[() => void, number]>()),
      logger: this.loggerFactory?.create(`${topic}#${partitionId}`, {
        topic,
        partitionId,
      }),
      sink: this.sink,
    });
  }
}
