import { MessageFactory } from "@app/factories/MessageFactory";
import type { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import { SizeValidator } from "@app/validators/SizeValidator";
import type { AckMessage } from "@domain/entities/AckMessage";
import { HandlerInvocation } from "@domain/entities/HandlerInvocation";
import type { Message } from "@domain/entities/Message";
import type { PendingDelivery } from "@domain/entities/PendingDelivery";
import {
  AlreadySubscribedError,
  BacklogFullError,
  DeliveryFailedError,
  PartitionClosedError,
  SubscriptionClosedError,
} from "@domain/errors/PubSubError";
import type { IPubSubConfig } from "@domain/interfaces/IPubSubConfig";
import type {
  IAckTrackerDelegate,
  SettledStatus,
} from "@domain/interfaces/delivery/IAckTrackerDelegate";
import type {
  IDeliveryOutcome,
  OutcomeListener,
} from "@domain/interfaces/delivery/IDeliveryOutcome";
import type {
  IMessageMetadata,
  OrderingKey,
} from "@domain/interfaces/message/IMessageMetadata";
import type {
  IPartition,
  IPartitionMetrics,
  PartitionState,
} from "@domain/interfaces/partition/IPartition";
import { DeliveryGuarantee } from "@domain/interfaces/subscription/DeliveryGuarantee";
import type {
  IBatchConsumer,
  SubscriptionHandler,
} from "@domain/interfaces/subscription/IBatchConsumer";
import type {
  IResolvedSubscriptionOptions,
  ISubscriptionOptions,
} from "@domain/interfaces/subscription/ISubscriptionOptions";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";
import type { ILogger } from "@domain/ports/ILogger";
import type { ITimeoutScheduler } from "@domain/ports/ITimeoutScheduler";
import { toError } from "@domain/utils/errors";
import { normalizeOrderingKey, UNORDERED_KEY } from "@domain/utils/keys";
import { AckTracker } from "./AckTracker";
import type { IDedupLedger } from "./DedupLedger";
import type { IBatch, ISequencedEntry } from "./OrderingSequencer";
import { OrderingSequencer } from "./OrderingSequencer";
import { OutcomeNotifier } from "./OutcomeNotifier";

export type OutcomeSink = (outcome: IDeliveryOutcome, message: Message) => void;

export interface IPartitionContext {
  config: IPubSubConfig;
  ledger: IDedupLedger;
  optionsValidator: SubscriptionOptionsValidator;
  createScheduler: () => ITimeoutScheduler;
  logger?: ILogger;
  sink?: OutcomeSink;
}

interface ISubscription {
  consumer: IBatchConsumer;
  metadata: unknown;
  options: IResolvedSubscriptionOptions;
  tracker: AckTracker;
  scheduler: ITimeoutScheduler;
  sweepTimer: NodeJS.Timeout;
  abort: AbortController;
  ackLoop?: Promise<void>;
}

interface IHandoff {
  messages: Message[];
  invocation: HandlerInvocation;
  consumer: IBatchConsumer;
  tracker: AckTracker;
}

interface IDrainTimer {
  handle: NodeJS.Timeout;
  endsAt: number;
  expire: () => void;
}

interface IBlockedPublisher {
  message: Message;
  orderingKey: string;
  resolve: () => void;
  reject: (error: Error) => void;
}

export function toBatchConsumer(handler: SubscriptionHandler): IBatchConsumer {
  return typeof handler === "function" ? { deliver: handler } : handler;
}

/**
 * One ordered shard of a topic: its pending messages, its single
 * subscriber and that subscriber's in-flight deliveries.
 */
export class Partition implements IPartition, IAckTrackerDelegate {
  private _state: PartitionState = "open";
  private sequencer = new OrderingSequencer();
  private subscription?: ISubscription;
  private orderingKey = UNORDERED_KEY;
  private messageFactory: MessageFactory;
  private notifier: OutcomeNotifier;

  private handoffs: IHandoff[] = [];
  private handoffScheduled = false;
  private pumping = false;
  private blockedPublishers: IBlockedPublisher[] = [];

  private closeRequested = false;
  private draining?: Promise<void>;
  private drainTimer?: IDrainTimer;
  private onDrained?: () => void;
  private closing?: Promise<void>;

  private counters = {
    published: 0,
    delivered: 0,
    acked: 0,
    failed: 0,
    redelivered: 0,
  };

  constructor(
    readonly topic: string,
    readonly id: number,
    private readonly ctx: IPartitionContext
  ) {
    this.notifier = new OutcomeNotifier(ctx.logger);
    this.messageFactory = new MessageFactory([
      new SizeValidator(() => this.maxMessageSize),
    ]);
  }

  get state() {
    return this._state;
  }

  get isSubscribed() {
    return this.subscription !== undefined;
  }

  private get label() {
    return `${this.topic}#${this.id}`;
  }

  private get maxMessageSize() {
    return (
      this.subscription?.options.maxMessageSize ?? this.ctx.config.maxMessageSize
    );
  }

  subscribe(
    handler: SubscriptionHandler,
    metadata: unknown,
    options: Partial<ISubscriptionOptions> = {},
    ackChannel?: IAckReceiver
  ): void {
    this.assertOpen();
    if (this.subscription) {
      throw new AlreadySubscribedError(`Partition ${this.label}`);
    }

    const resolved = this.ctx.optionsValidator.resolve(options);
    this.warnOnShortDedupWindow(resolved);

    const scheduler = this.ctx.createScheduler();
    const tracker = new AckTracker(
      this.topic,
      this.id,
      resolved,
      this.ctx.ledger,
      scheduler,
      this,
      metadata,
      this.ctx.logger
    );
    const sweepTimer = setInterval(
      () => tracker.sweep(),
      this.ctx.config.sweepIntervalMs
    );
    sweepTimer.unref();

    const subscription: ISubscription = {
      consumer: toBatchConsumer(handler),
      metadata,
      options: resolved,
      tracker,
      scheduler,
      sweepTimer,
      abort: new AbortController(),
    };
    this.subscription = subscription;

    if (ackChannel) {
      subscription.ackLoop = this.consumeAcks(
        ackChannel,
        subscription.abort.signal
      );
    }

    this.ctx.logger?.log(`Subscribed to ${this.label}.`, {
      metadata,
      guarantee: resolved.deliveryGuarantee,
    });

    this.pump();
  }

  async unsubscribe(graceMs = this.ctx.config.closeGracePeriodMs) {
    if (this._state === "closed") {
      throw new PartitionClosedError(this.topic, this.id);
    }
    if (this._state === "draining") {
      await (this.draining ?? this.closing);
      return;
    }
    if (!this.subscription) return;

    this._state = "draining";
    await this.drain(graceMs);
    await this.detach();

    if (this.closeRequested) return;
    this._state = "open";
    this.ctx.logger?.log(`Unsubscribed from ${this.label}.`, {
      backlog: this.sequencer.size,
    });
    this.pump();
  }

  async publish(
    value: Uint8Array,
    metadata: IMessageMetadata = {},
    orderingKey?: OrderingKey | null
  ): Promise<Message> {
    this.assertOpen();
    const message = this.messageFactory.create(value, metadata);
    await this.enqueue(message, orderingKey);
    return message;
  }

  async publishMessage(message: Message, orderingKey?: OrderingKey | null) {
    this.assertOpen();
    this.messageFactory.validate(message);
    await this.enqueue(message, orderingKey);
  }

  /** Checks messages against the size limit without enqueueing any. */
  validate(messages: readonly Message[]) {
    this.assertOpen();
    messages.forEach((message) => this.messageFactory.validate(message));
  }

  setOrderingKey(orderingKey: OrderingKey | null) {
    this.assertOpen();
    this.orderingKey = normalizeOrderingKey(orderingKey);
  }

  acknowledge(ack: AckMessage): boolean {
    const tracker = this.subscription?.tracker;
    if (!tracker) return false;
    return tracker.resolve(ack);
  }

  isTracking(messageId: string) {
    return this.subscription?.tracker.has(messageId) ?? false;
  }

  onOutcome(listener: OutcomeListener) {
    return this.notifier.add(listener);
  }

  close(graceMs = this.ctx.config.closeGracePeriodMs): Promise<void> {
    this.closing ??= this.shutdown(graceMs);
    return this.closing;
  }

  getMetrics(): IPartitionMetrics {
    return {
      topic: this.topic,
      id: this.id,
      state: this._state,
      subscribed: this.isSubscribed,
      backlog: this.sequencer.size,
      inFlight: this.subscription?.tracker.size ?? 0,
      lanes: this.sequencer.laneCount,
      ...this.counters,
    };
  }

  // IAckTrackerDelegate

  redeliver(deliveries: PendingDelivery[]) {
    const subscription = this.subscription;
    if (!subscription || this._state !== "open") {
      deliveries.forEach((d) => this.withdraw(d));
      this.checkDrained();
      return;
    }

    const byKey = new Map<string, PendingDelivery[]>();
    for (const delivery of deliveries) {
      const group = byKey.get(delivery.orderingKey) ?? [];
      group.push(delivery);
      byKey.set(delivery.orderingKey, group);
    }

    const { maxBatchSize } = subscription.options;
    for (const group of byKey.values()) {
      for (let i = 0; i < group.length; i += maxBatchSize) {
        const chunk = group.slice(i, i + maxBatchSize);
        this.counters.redelivered += chunk.length;
        this.handoff(subscription, chunk);
      }
    }
  }

  settle(delivery: PendingDelivery, status: SettledStatus, error?: Error) {
    this.sequencer.release(delivery.orderingKey);

    if (status === "acked") this.counters.acked++;
    if (status === "failed") {
      this.counters.failed++;
      error = new DeliveryFailedError(
        delivery.messageId,
        delivery.attempts,
        error
      );
      this.ctx.logger?.log(
        "Message delivery failed permanently.",
        { messageId: delivery.messageId, attempts: delivery.attempts },
        "error"
      );
    }

    this.emit(
      {
        status,
        messageId: delivery.messageId,
        topic: this.topic,
        partitionId: this.id,
        attempts: delivery.attempts,
        error,
      },
      delivery.message
    );

    this.checkDrained();
    this.pump();
  }

  private async enqueue(message: Message, orderingKey?: OrderingKey | null) {
    const key =
      orderingKey === undefined
        ? this.orderingKey
        : normalizeOrderingKey(orderingKey);

    const { maxBacklog, backlogPolicy } = this.ctx.config;
    const isFull =
      this.blockedPublishers.length > 0 || this.sequencer.size >= maxBacklog;

    if (isFull) {
      if (backlogPolicy === "reject") throw new BacklogFullError(maxBacklog);
      // admitted (or rejected on close) by the pump
      await new Promise<void>((resolve, reject) => {
        this.blockedPublishers.push({
          message,
          orderingKey: key,
          resolve,
          reject,
        });
      });
      return;
    }

    this.sequencer.enqueue(message, key);
    this.counters.published++;
    this.pump();
  }

  private pump() {
    if (this.pumping) return;
    this.pumping = true;

    try {
      for (;;) {
        this.admitBlockedPublishers();

        const subscription = this.subscription;
        if (!subscription || this._state !== "open") return;

        const { deliveryGuarantee, maxBatchSize } = subscription.options;
        const gated = deliveryGuarantee !== DeliveryGuarantee.AtMostOnceWithRetry;
        const batches = this.sequencer.take(gated, maxBatchSize);
        if (!batches.length) return;

        batches.forEach((batch) => this.dispatch(subscription, batch));
      }
    } finally {
      this.pumping = false;
    }
  }

  private admitBlockedPublishers() {
    const { maxBacklog } = this.ctx.config;
    while (this.blockedPublishers.length && this.sequencer.size < maxBacklog) {
      const publisher = this.blockedPublishers.shift();
      if (!publisher) break;
      this.sequencer.enqueue(publisher.message, publisher.orderingKey);
      this.counters.published++;
      publisher.resolve();
    }
  }

  private dispatch(subscription: ISubscription, batch: IBatch) {
    const { tracker } = subscription;
    const isExactlyOnce =
      subscription.options.deliveryGuarantee === DeliveryGuarantee.ExactlyOnce;
    const deliveries: PendingDelivery[] = [];

    for (const entry of batch.entries) {
      const { messageId } = entry.message;
      const isDuplicate =
        tracker.has(messageId) ||
        (isExactlyOnce && this.ctx.ledger.has(messageId));

      if (isDuplicate) {
        this.sequencer.release(entry.orderingKey);
        this.emit(
          {
            status: "duplicate",
            messageId,
            topic: this.topic,
            partitionId: this.id,
            attempts: 0,
          },
          entry.message
        );
        continue;
      }

      deliveries.push(tracker.track(entry));
    }

    if (deliveries.length) this.handoff(subscription, deliveries);
  }

  private handoff(subscription: ISubscription, deliveries: PendingDelivery[]) {
    const invocation = new HandlerInvocation(
      deliveries.map((d) => d.messageId)
    );
    deliveries.forEach((d) => subscription.tracker.dispatched(d, invocation));
    this.counters.delivered += deliveries.length;

    this.handoffs.push({
      messages: deliveries.map((d) => d.message),
      invocation,
      consumer: subscription.consumer,
      tracker: subscription.tracker,
    });

    if (!this.handoffScheduled) {
      this.handoffScheduled = true;
      queueMicrotask(this.flushHandoffs);
    }
  }

  /** Calls the handler outside of dispatch, in handoff order. */
  private flushHandoffs = () => {
    this.handoffScheduled = false;
    for (const handoff of this.handoffs.splice(0)) {
      this.invoke(handoff);
    }
  };

  private invoke(handoff: IHandoff) {
    let result: void | Promise<void>;
    try {
      result = handoff.consumer.deliver(handoff.messages);
    } catch (error) {
      this.onHandlerError(handoff, error);
      this.onHandlerSettled(handoff);
      return;
    }

    if (!(result instanceof Promise)) {
      this.onHandlerSettled(handoff);
      return;
    }

    void result.then(
      () => this.onHandlerSettled(handoff),
      (error: unknown) => {
        this.onHandlerError(handoff, error);
        this.onHandlerSettled(handoff);
      }
    );
  }

  private onHandlerError(handoff: IHandoff, error: unknown) {
    const err = toError(error);
    this.ctx.logger?.log(
      "Handler failed.",
      { partition: this.label, error: err.message },
      "warn"
    );
    handoff.tracker.failInvocation(handoff.invocation, err);
  }

  private onHandlerSettled(handoff: IHandoff) {
    handoff.invocation.settled = true;
    handoff.tracker.onInvocationSettled(handoff.invocation);
  }

  private async consumeAcks(channel: IAckReceiver, signal: AbortSignal) {
    for (;;) {
      const result = await channel.take(signal);
      if (result.done) return;

      const ack = result.value;
      try {
        if (!this.acknowledge(ack)) {
          this.ctx.logger?.log(
            "Ack for an untracked message is ignored.",
            { partition: this.label, messageId: ack.messageId },
            "debug"
          );
        }
      } catch (error) {
        this.ctx.logger?.log(
          "Ack resolution failed.",
          { messageId: ack.messageId, error: toError(error).message },
          "error"
        );
      }
    }
  }

  /** A delivery leaves flight while draining: back to its lane or closed. */
  private withdraw(delivery: PendingDelivery) {
    this.subscription?.tracker.remove(delivery);

    if (!this.closeRequested) {
      this.sequencer.requeue(this.toEntry(delivery));
      return;
    }

    this.sequencer.release(delivery.orderingKey);
    this.emit(
      {
        status: "closed",
        messageId: delivery.messageId,
        topic: this.topic,
        partitionId: this.id,
        attempts: delivery.attempts,
        error: new SubscriptionClosedError(this.topic, this.id),
      },
      delivery.message
    );
  }

  private toEntry(delivery: PendingDelivery): ISequencedEntry {
    return {
      message: delivery.message,
      orderingKey: delivery.orderingKey,
      seq: delivery.seq,
    };
  }

  /** Joining a running drain can only bring its deadline forward. */
  private drain(graceMs: number): Promise<void> {
    if (this.draining) {
      this.shortenDrain(graceMs);
      return this.draining;
    }

    this.draining = new Promise<void>((resolve) => {
      const expire = () => {
        this.drainTimer = undefined;
        this.onDrained = undefined;
        const remaining = this.subscription?.tracker.removeAll() ?? [];
        remaining.forEach((d) => this.withdraw(d));
        resolve();
      };
      this.drainTimer = {
        handle: setTimeout(expire, graceMs),
        endsAt: Date.now() + graceMs,
        expire,
      };

      this.onDrained = () => {
        clearTimeout(this.drainTimer?.handle);
        this.drainTimer = undefined;
        resolve();
      };
      this.checkDrained();
    }).finally(() => {
      this.draining = undefined;
    });

    return this.draining;
  }

  private shortenDrain(graceMs: number) {
    const timer = this.drainTimer;
    const endsAt = Date.now() + graceMs;
    if (!timer || endsAt >= timer.endsAt) return;

    clearTimeout(timer.handle);
    timer.handle = setTimeout(timer.expire, graceMs);
    timer.endsAt = endsAt;
  }

  private checkDrained() {
    if (!this.onDrained) return;
    if (this.subscription && this.subscription.tracker.size > 0) return;

    const done = this.onDrained;
    this.onDrained = undefined;
    done();
  }

  private async detach() {
    const subscription = this.subscription;
    if (!subscription) return;

    clearInterval(subscription.sweepTimer);
    subscription.scheduler.stop();
    subscription.abort.abort();

    const remaining = subscription.tracker.removeAll();
    remaining.forEach((d) => this.withdraw(d));
    this.subscription = undefined;

    await subscription.ackLoop;
  }

  private async shutdown(graceMs: number) {
    this.closeRequested = true;
    this._state = "draining";

    for (const publisher of this.blockedPublishers.splice(0)) {
      publisher.reject(new PartitionClosedError(this.topic, this.id));
    }
    this.releasePending();

    if (this.draining || this.subscription) await this.drain(graceMs);
    await this.detach();

    this.releasePending();
    this.handoffs = [];
    this._state = "closed";
    this.notifier.clear();

    this.ctx.logger?.log(`Partition ${this.label} is closed.`, {
      ...this.counters,
    });
  }

  private releasePending() {
    for (const entry of this.sequencer.drainPending()) {
      this.emit(
        {
          status: "closed",
          messageId: entry.message.messageId,
          topic: this.topic,
          partitionId: this.id,
          attempts: 0,
          error: new SubscriptionClosedError(this.topic, this.id),
        },
        entry.message
      );
    }
  }

  private emit(outcome: IDeliveryOutcome, message: Message) {
    this.notifier.emit(outcome);
    this.ctx.sink?.(outcome, message);
  }

  private assertOpen() {
    if (this._state !== "open") {
      throw new PartitionClosedError(this.topic, this.id);
    }
  }

  private warnOnShortDedupWindow(options: IResolvedSubscriptionOptions) {
    if (options.deliveryGuarantee !== DeliveryGuarantee.ExactlyOnce) return;

    const span = options.ackTimeoutMs * (options.maxRetries + 1);
    if (span < this.ctx.config.dedupRetentionMs) return;

    this.ctx.logger?.log(
      "Dedup retention is shorter than the redelivery span.",
      { span, retention: this.ctx.config.dedupRetentionMs },
      "warn"
    );
  }
}
