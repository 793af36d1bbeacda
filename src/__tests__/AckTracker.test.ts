import { AckTracker } from "@app/services/AckTracker";
import { DedupLedger } from "@app/services/DedupLedger";
import { OrderingSequencer } from "@app/services/OrderingSequencer";
import { SubscriptionOptionsValidator } from "@app/validators/SubscriptionOptionsValidator";
import { HandlerInvocation } from "@domain/entities/HandlerInvocation";
import type { PendingDelivery } from "@domain/entities/PendingDelivery";
import { AckTimeoutError } from "@domain/errors/PubSubError";
import type { SettledStatus } from "@domain/interfaces/delivery/IAckTrackerDelegate";
import { DeliveryGuarantee } from "@domain/interfaces/subscription/DeliveryGuarantee";
import type { ISubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";
import { BinaryHeapPriorityQueue } from "@infra/queue/BinaryHeapPriorityQueue";
import { TimeoutScheduler } from "@infra/scheduling/TimeoutScheduler";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { message } from "./helpers";

function setup(options: Partial<ISubscriptionOptions> = {}) {
  const sequencer = new OrderingSequencer();
  const ledger = new DedupLedger();
  const delegate = {
    redeliver: vi.fn<(deliveries: PendingDelivery[]) => void>(),
    settle:
      vi.fn<
        (delivery: PendingDelivery, status: SettledStatus, error?: Error) => void
      >(),
  };
  const resolved = new SubscriptionOptionsValidator(1024).resolve({
    ackTimeoutMs: 100,
    maxRetries: 2,
    ...options,
  });
  const scheduler = new TimeoutScheduler(
    new BinaryHeapPriorityQueue<[() => void, number]>()
  );
  const tracker = new AckTracker(
    "orders",
    0,
    resolved,
    ledger,
    scheduler,
    delegate
  );

  /** Tracks and hands out a message the way a partition does. */
  const dispatch = (messageId: string) => {
    const delivery = tracker.track(sequencer.enqueue(message(messageId)));
    const invocation = new HandlerInvocation([messageId]);
    tracker.dispatched(delivery, invocation);
    return { delivery, invocation };
  };

  const redispatch = (delivery: PendingDelivery) => {
    const invocation = new HandlerInvocation([delivery.messageId]);
    tracker.dispatched(delivery, invocation);
    return invocation;
  };

  return { tracker, ledger, delegate, dispatch, redispatch };
}

describe("AckTracker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stamps a deadline on dispatch", () => {
    const { dispatch } = setup();
    const { delivery } = dispatch("m1");

    expect(delivery.attempts).toBe(1);
    expect(delivery.deadline).toBe(100);
    expect(delivery.status).toBe("in_flight");
  });

  it("settles a success ack and ignores unknown ids", () => {
    const { tracker, delegate, dispatch } = setup();
    const { delivery } = dispatch("m1");

    expect(tracker.resolve({ messageId: "m1" })).toBe(true);
    expect(delegate.settle).toHaveBeenCalledWith(delivery, "acked");
    expect(tracker.size).toBe(0);
    expect(tracker.resolve({ messageId: "m1" })).toBe(false);
  });

  it("redelivers after an error ack and ignores further error acks meanwhile", () => {
    const { tracker, delegate, dispatch } = setup();
    const { delivery } = dispatch("m1");

    tracker.resolve({ messageId: "m1", error: new Error("boom") });
    tracker.resolve({ messageId: "m1", error: new Error("boom again") });

    expect(delegate.redeliver).toHaveBeenCalledTimes(1);
    expect(delegate.redeliver).toHaveBeenCalledWith([delivery]);
    expect(delivery.failures).toBe(1);
    expect(delivery.status).toBe("retry_scheduled");
    expect(delivery.lastError?.message).toBe("boom");
  });

  it("expires deliveries on sweep once the deadline is reached", () => {
    const { tracker, delegate, dispatch } = setup();
    const { delivery } = dispatch("m1");

    tracker.sweep(99);
    expect(delegate.redeliver).not.toHaveBeenCalled();

    tracker.sweep(100);
    expect(delegate.redeliver).toHaveBeenCalledWith([delivery]);
    expect(delivery.lastError).toBeInstanceOf(AckTimeoutError);
  });

  it("fails a delivery after maxRetries + 1 attempts", () => {
    const { tracker, delegate, dispatch, redispatch } = setup({ maxRetries: 2 });
    const { delivery } = dispatch("m1");

    tracker.resolve({ messageId: "m1", error: new Error("boom") });
    redispatch(delivery);
    tracker.resolve({ messageId: "m1", error: new Error("boom") });
    redispatch(delivery);
    tracker.resolve({ messageId: "m1", error: new Error("last") });

    expect(delegate.redeliver).toHaveBeenCalledTimes(2);
    expect(delivery.attempts).toBe(3);
    expect(delegate.settle).toHaveBeenCalledTimes(1);
    const [settled, status, error] = delegate.settle.mock.calls[0];
    expect(settled).toBe(delivery);
    expect(status).toBe("failed");
    expect(error?.message).toBe("last");
    expect(tracker.size).toBe(0);
  });

  it("backs off exponentially after error acks", () => {
    const { tracker, delegate, dispatch } = setup({
      initialBackoffMs: 100,
      maxBackoffMs: 150,
    });
    expect(tracker.getRetryBackoff(1)).toBe(100);
    expect(tracker.getRetryBackoff(2)).toBe(150);
    expect(tracker.getRetryBackoff(3)).toBe(150);

    dispatch("m1");
    tracker.resolve({ messageId: "m1", error: new Error("boom") });

    vi.advanceTimersByTime(99);
    expect(delegate.redeliver).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(delegate.redeliver).toHaveBeenCalledTimes(1);
  });

  it("lets a late success cancel a scheduled redelivery", () => {
    const { tracker, delegate, dispatch } = setup({ initialBackoffMs: 100 });
    const { delivery } = dispatch("m1");

    tracker.resolve({ messageId: "m1", error: new Error("boom") });
    tracker.resolve({ messageId: "m1" });
    vi.advanceTimersByTime(100);

    expect(delegate.settle).toHaveBeenCalledWith(delivery, "acked");
    expect(delegate.redeliver).not.toHaveBeenCalled();
  });

  it("fails every in-flight message of a failed invocation", () => {
    const { tracker, delegate } = setup();
    const sequencer = new OrderingSequencer();
    const first = tracker.track(sequencer.enqueue(message("m1")));
    const second = tracker.track(sequencer.enqueue(message("m2")));
    const invocation = new HandlerInvocation(["m1", "m2"]);
    tracker.dispatched(first, invocation);
    tracker.dispatched(second, invocation);

    tracker.failInvocation(invocation, new Error("handler threw"));

    expect(delegate.redeliver).toHaveBeenCalledWith([first, second]);
  });

  describe("exactly once", () => {
    it("marks the ledger on success and reports a repeat as duplicate", () => {
      const { tracker, ledger, delegate, dispatch } = setup({
        deliveryGuarantee: DeliveryGuarantee.ExactlyOnce,
      });
      const first = dispatch("m1");
      tracker.resolve({ messageId: "m1" });
      const second = dispatch("m1");
      tracker.resolve({ messageId: "m1" });

      expect(ledger.size).toBe(1);
      expect(delegate.settle.mock.calls.map(([d, s]) => [d, s])).toEqual([
        [first.delivery, "acked"],
        [second.delivery, "duplicate"],
      ]);
    });

    it("does not redeliver a message the ledger has seen", () => {
      const { tracker, ledger, delegate, dispatch } = setup({
        deliveryGuarantee: DeliveryGuarantee.ExactlyOnce,
      });
      const { delivery } = dispatch("m1");
      ledger.markSuccess("m1");

      tracker.resolve({ messageId: "m1", error: new Error("boom") });

      expect(delegate.redeliver).not.toHaveBeenCalled();
      expect(delegate.settle).toHaveBeenCalledWith(delivery, "duplicate");
    });

    it("reports a seen message as duplicate even with no retries left", () => {
      const { tracker, ledger, delegate, dispatch } = setup({
        deliveryGuarantee: DeliveryGuarantee.ExactlyOnce,
        maxRetries: 0,
      });
      const { delivery } = dispatch("m1");
      ledger.markSuccess("m1");

      tracker.resolve({ messageId: "m1", error: new Error("boom") });

      expect(delegate.settle).toHaveBeenCalledTimes(1);
      expect(delegate.settle).toHaveBeenCalledWith(delivery, "duplicate");
      expect(tracker.has("m1")).toBe(false);
    });
  });

  describe("at most once with retry", () => {
    it("waits for the running invocation before redelivering", () => {
      const { tracker, delegate, dispatch } = setup({
        deliveryGuarantee: DeliveryGuarantee.AtMostOnceWithRetry,
      });
      const { delivery, invocation } = dispatch("m1");

      tracker.resolve({ messageId: "m1", error: new Error("boom") });
      expect(delivery.status).toBe("awaiting_settlement");
      expect(delegate.redeliver).not.toHaveBeenCalled();

      invocation.settled = true;
      tracker.onInvocationSettled(invocation);
      expect(delegate.redeliver).toHaveBeenCalledWith([delivery]);
    });

    it("counts a missed deadline while parked as another failure", () => {
      const { tracker, delegate, dispatch } = setup({
        deliveryGuarantee: DeliveryGuarantee.AtMostOnceWithRetry,
        maxRetries: 1,
      });
      const { delivery } = dispatch("m1");

      tracker.sweep(100);
      expect(delivery.failures).toBe(1);
      expect(delivery.deadline).toBe(100);

      tracker.sweep(100);
      expect(delivery.failures).toBe(2);
      expect(delegate.settle).toHaveBeenCalledWith(
        delivery,
        "failed",
        expect.any(AckTimeoutError)
      );
      expect(delegate.redeliver).not.toHaveBeenCalled();
    });
  });
});
