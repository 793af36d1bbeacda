import type { DLQReason } from "@domain/interfaces/dlq/DLQReason";
import type { IDLQEntry } from "@domain/interfaces/dlq/IDLQEntry";
import type { ILogger } from "@domain/ports/ILogger";

export interface IDLQManager {
  enqueue(entry: Omit<IDLQEntry, "deadLetteredAt">): void;
  createReader(): Generator<IDLQEntry, void, unknown>;
  replay(
    handler: (entry: IDLQEntry) => Promise<void> | void,
    filter?: (entry: IDLQEntry) => boolean
  ): Promise<number>;
  getMetrics(): { size: number; reasons: Record<DLQReason, number> };
}

export class DLQManager implements IDLQManager {
  private entries = new Map<number, IDLQEntry>();
  private nextId = 0;

  constructor(
    private maxEntries = 100_000,
    private logger?: ILogger
  ) {}

  get size() {
    return this.entries.size;
  }

  enqueue(entry: Omit<IDLQEntry, "deadLetteredAt">): void {
    this.entries.set(this.nextId++, { ...entry, deadLetteredAt: Date.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.logger?.log(
      `Message is routed to DLQ. Reason: ${entry.reason}.`,
      {
        messageId: entry.message.messageId,
        topic: entry.topic,
        partitionId: entry.partitionId,
        attempts: entry.attempts,
      },
      "warn"
    );
  }

  *createReader(): Generator<IDLQEntry, void, unknown> {
    for (const entry of this.entries.values()) {
      yield entry;
    }
  }

  async replay(
    handler: (entry: IDLQEntry) => Promise<void> | void,
    filter?: (entry: IDLQEntry) => boolean
  ): Promise<number> {
    let count = 0;

    for (const [id, entry] of Array.from(this.entries)) {
      if (filter && !filter(entry)) continue;
      try {
        await handler(entry);
        this.entries.delete(id);
        count++;
      } catch (error) {
        this.logger?.log(
          "DLQ replay failed, entry is kept.",
          { messageId: entry.message.messageId, error: String(error) },
          "error"
        );
      }
    }

    this.logger?.log("Replayed DLQ messages.", { count }, "warn");
    return count;
  }

  getMetrics() {
    const reasons: Record<DLQReason, number> = { max_retries: 0, closed: 0 };
    for (const entry of this.entries.values()) reasons[entry.reason]++;
    return { size: this.entries.size, reasons };
  }

  clear() {
    this.entries.clear();
  }
}
