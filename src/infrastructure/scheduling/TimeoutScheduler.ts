import type { IPriorityQueue } from "@domain/ports/IPriorityQueue";
import type { ITimeoutScheduler } from "@domain/ports/ITimeoutScheduler";

/** Runs delayed tasks off one timer armed for the earliest deadline. */
export class TimeoutScheduler implements ITimeoutScheduler {
  private nextTimeout?: NodeJS.Timeout;
  private isProcessing = false;

  constructor(private queue: IPriorityQueue<[() => void, number]>) {}

  schedule(task: () => void, delayMs: number) {
    const readyTs = Date.now() + Math.max(0, delayMs);
    this.queue.enqueue([task, readyTs], readyTs);
    this.setNextTimeout();
  }

  size() {
    return this.queue.size();
  }

  stop() {
    clearTimeout(this.nextTimeout);
    this.nextTimeout = undefined;
    this.queue.clear();
  }

  private setNextTimeout(): void {
    if (this.isProcessing) return;

    const record = this.queue.peek();
    if (!record) return;

    const delay = Math.max(0, record[1] - Date.now());
    clearTimeout(this.nextTimeout);
    this.nextTimeout = setTimeout(this.onTimeoutHandler, delay);
  }

  private onTimeoutHandler = () => {
    if (this.isProcessing) return;
    this.isProcessing = true;
    this.nextTimeout = undefined;
    const now = Date.now();

    try {
      for (;;) {
        const record = this.queue.peek();
        if (!record || record[1] > now) break; // next one is not ready yet
        this.queue.dequeue();
        record[0]();
      }
    } finally {
      this.isProcessing = false;
      this.setNextTimeout();
    }
  };
}
