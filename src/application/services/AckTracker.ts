import type { AckMessage } from "@domain/entities/AckMessage";
import type { HandlerInvocation } from "@domain/entities/HandlerInvocation";
import { PendingDelivery } from "@domain/entities/PendingDelivery";
import { AckTimeoutError } from "@domain/errors/PubSubError";
import type { IAckTrackerDelegate } from "@domain/interfaces/delivery/IAckTrackerDelegate";
import { DeliveryGuarantee } from "@domain/interfaces/subscription/DeliveryGuarantee";
import type { IResolvedSubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";
import type { ILogger } from "@domain/ports/ILogger";
import type { ITimeoutScheduler } from "@domain/ports/ITimeoutScheduler";
import type { ISequencedEntry } from "./OrderingSequencer";
import type { IDedupLedger } from "./DedupLedger";

type FailureCause = "error" | "timeout";

/**
 * In-flight deliveries of one subscription: deadlines, retry budget and
 * the guarantee-specific redelivery policy.
 */
export class AckTracker {
  private deliveries = new Map<string, PendingDelivery>();
  private redeliveries: PendingDelivery[] = [];

  constructor(
    private readonly topic: string,
    private readonly partitionId: number,
    private readonly options: IResolvedSubscriptionOptions,
    private readonly ledger: IDedupLedger,
    private readonly scheduler: ITimeoutScheduler,
    private readonly delegate: IAckTrackerDelegate,
    private readonly subscriber?: unknown,
    private readonly logger?: ILogger
  ) {}

  get size() {
    return this.deliveries.size;
  }

  get guarantee() {
    return this.options.deliveryGuarantee;
  }

  has(messageId: string) {
    return this.deliveries.has(messageId);
  }

  track(entry: ISequencedEntry): PendingDelivery {
    const delivery = new PendingDelivery(
      entry.message,
      this.topic,
      this.partitionId,
      entry.orderingKey,
      entry.seq,
      this.subscriber
    );
    this.deliveries.set(delivery.messageId, delivery);
    return delivery;
  }

  /** Stamps a (re)delivery handed to the handler. */
  dispatched(delivery: PendingDelivery, invocation: HandlerInvocation) {
    delivery.attempts++;
    delivery.deadline = Date.now() + this.options.ackTimeoutMs;
    delivery.status = "in_flight";
    delivery.invocation = invocation;
  }

  remove(delivery: PendingDelivery) {
    if (this.deliveries.get(delivery.messageId) === delivery) {
      this.deliveries.delete(delivery.messageId);
    }
  }

  removeAll(): PendingDelivery[] {
    const removed = Array.from(this.deliveries.values());
    this.deliveries.clear();
    this.redeliveries = [];
    return removed.sort((a, b) => a.seq - b.seq);
  }

  /** Returns false when the ack names a message this tracker does not hold. */
  resolve(ack: AckMessage): boolean {
    const delivery = this.deliveries.get(ack.messageId);
    if (!delivery) return false;

    if (!ack.error) {
      this.succeed(delivery);
    } else if (delivery.status === "in_flight") {
      this.fail(delivery, ack.error, "error");
    }

    this.flushRedeliveries();
    return true;
  }

  /** The handler threw or rejected for the whole invocation. */
  failInvocation(invocation: HandlerInvocation, error: Error) {
    for (const messageId of invocation.messageIds) {
      const delivery = this.deliveries.get(messageId);
      if (delivery?.invocation !== invocation) continue;
      if (delivery.status !== "in_flight") continue;
      this.fail(delivery, error, "error");
    }
    this.flushRedeliveries();
  }

  onInvocationSettled(invocation: HandlerInvocation) {
    for (const messageId of invocation.messageIds) {
      const delivery = this.deliveries.get(messageId);
      if (delivery?.invocation !== invocation) continue;
      if (delivery.status !== "awaiting_settlement") continue;
      this.scheduleRedelivery(delivery, delivery.retryDelayMs);
    }
    this.flushRedeliveries();
  }

  /** Expires deliveries past their deadline. */
  sweep(now = Date.now()) {
    const expired: PendingDelivery[] = [];
    for (const delivery of this.deliveries.values()) {
      if (delivery.status === "retry_scheduled") continue;
      if (now >= delivery.deadline) expired.push(delivery);
    }

    for (const delivery of expired) {
      this.fail(
        delivery,
        new AckTimeoutError(delivery.messageId, this.options.ackTimeoutMs),
        "timeout"
      );
    }
    this.flushRedeliveries();
  }

  getRetryBackoff(failures: number) {
    const { initialBackoffMs, maxBackoffMs } = this.options;
    if (!initialBackoffMs) return 0;
    return Math.min(maxBackoffMs, initialBackoffMs * Math.pow(2, failures - 1));
  }

  private succeed(delivery: PendingDelivery) {
    this.deliveries.delete(delivery.messageId);

    if (this.guarantee === DeliveryGuarantee.ExactlyOnce) {
      if (!this.ledger.markSuccess(delivery.messageId)) {
        this.logger?.log(
          "Ack ignored, message was already processed.",
          { messageId: delivery.messageId },
          "debug"
        );
        this.delegate.settle(delivery, "duplicate");
        return;
      }
    }

    this.delegate.settle(delivery, "acked");
  }

  private fail(delivery: PendingDelivery, error: Error, cause: FailureCause) {
    delivery.failures++;
    delivery.lastError = error;

    if (
      this.guarantee === DeliveryGuarantee.ExactlyOnce &&
      this.ledger.has(delivery.messageId)
    ) {
      this.deliveries.delete(delivery.messageId);
      this.delegate.settle(delivery, "duplicate");
      return;
    }

    if (delivery.failures > this.options.maxRetries) {
      this.deliveries.delete(delivery.messageId);
      this.delegate.settle(delivery, "failed", error);
      return;
    }

    const delay =
      cause === "error" ? this.getRetryBackoff(delivery.failures) : 0;

    // no second copy while the previous invocation still holds this one
    if (
      this.guarantee === DeliveryGuarantee.AtMostOnceWithRetry &&
      delivery.invocation &&
      !delivery.invocation.settled
    ) {
      delivery.status = "awaiting_settlement";
      delivery.retryDelayMs = delay;
      delivery.deadline = Date.now() + this.options.ackTimeoutMs;
      return;
    }

    this.logger?.log(
      `Message is retried after ${cause}.`,
      {
        messageId: delivery.messageId,
        failures: delivery.failures,
        delay,
        error: error.message,
      },
      "warn"
    );
    this.scheduleRedelivery(delivery, delay);
  }

  private scheduleRedelivery(delivery: PendingDelivery, delayMs: number) {
    delivery.status = "retry_scheduled";
    if (delayMs <= 0) {
      this.redeliveries.push(delivery);
      return;
    }

    this.scheduler.schedule(() => {
      if (this.deliveries.get(delivery.messageId) !== delivery) return;
      if (delivery.status !== "retry_scheduled") return;
      this.redeliveries.push(delivery);
      this.flushRedeliveries();
    }, delayMs);
  }

  private flushRedeliveries() {
    if (!this.redeliveries.length) return;
    const batch = this.redeliveries
      .splice(0)
      .filter((d) => this.deliveries.get(d.messageId) === d)
      .sort((a, b) => a.seq - b.seq);
    if (batch.length) this.delegate.redeliver(batch);
  }
}
