import { BinaryHeapPriorityQueue } from "@infra/queue/BinaryHeapPriorityQueue";
import { TimeoutScheduler } from "@infra/scheduling/TimeoutScheduler";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const createScheduler = () =>
  new TimeoutScheduler(new BinaryHeapPriorityQueue<[() => void, number]>());

describe("TimeoutScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs tasks in deadline order", () => {
    const scheduler = createScheduler();
    const ran: string[] = [];
    scheduler.schedule(() => ran.push("late"), 50);
    scheduler.schedule(() => ran.push("early"), 10);
    scheduler.schedule(() => ran.push("early-2"), 10);

    vi.advanceTimersByTime(10);
    expect(ran).toEqual(["early", "early-2"]);
    expect(scheduler.size()).toBe(1);

    vi.advanceTimersByTime(40);
    expect(ran).toEqual(["early", "early-2", "late"]);
  });

  it("drops queued tasks on stop", () => {
    const scheduler = createScheduler();
    const task = vi.fn();
    scheduler.schedule(task, 10);

    scheduler.stop();
    vi.advanceTimersByTime(10);

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.size()).toBe(0);
  });
});

describe("BinaryHeapPriorityQueue", () => {
  it("dequeues the lowest priority first", () => {
    const queue = new BinaryHeapPriorityQueue<string>();
    queue.enqueue("c", 3);
    queue.enqueue("a", 1);
    queue.enqueue("b", 2);

    expect(queue.peek()).toBe("a");
    expect([queue.dequeue(), queue.dequeue(), queue.dequeue()]).toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(queue.dequeue()).toBeUndefined();
  });
});
