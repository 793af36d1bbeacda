export interface IDedupLedger {
  has(messageId: string): boolean;
  /** Records a success; false when one is already on record. */
  markSuccess(messageId: string): boolean;
  evictExpired(now?: number): number;
  readonly size: number;
  clear(): void;
}

/**
 * Successful message ids kept for `retentionMs`. Exactly-once only holds
 * inside that window: an id evicted earlier is accepted as new again.
 * Entries are only ever written once, so insertion order is success order.
 */
export class DedupLedger implements IDedupLedger {
  private processed = new Map<string, number>(); // messageId:successTs

  constructor(
    private readonly retentionMs = 300_000,
    private readonly maxEntries = 100_000
  ) {}

  get size() {
    return this.processed.size;
  }

  has(messageId: string): boolean {
    const ts = this.processed.get(messageId);
    if (ts === undefined) return false;
    if (Date.now() - ts > this.retentionMs) {
      this.processed.delete(messageId);
      return false;
    }
    return true;
  }

  markSuccess(messageId: string): boolean {
    if (this.has(messageId)) return false;

    const now = Date.now();
    this.evictExpired(now);
    this.processed.set(messageId, now);

    while (this.processed.size > this.maxEntries) {
      const oldest = this.processed.keys().next();
      if (oldest.done) break;
      this.processed.delete(oldest.value);
    }

    return true;
  }

  evictExpired(now = Date.now()): number {
    let evicted = 0;
    for (const [messageId, ts] of this.processed) {
      if (now - ts <= this.retentionMs) break;
      this.processed.delete(messageId);
      evicted++;
    }
    return evicted;
  }

  clear() {
    this.processed.clear();
  }
}
