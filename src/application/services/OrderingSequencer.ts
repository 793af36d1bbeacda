import type { Message } from "@domain/entities/Message";
import { UNORDERED_KEY } from "@domain/utils/keys";

export interface ISequencedEntry {
  message: Message;
  orderingKey: string;
  seq: number;
}

export interface IBatch {
  orderingKey: string;
  entries: ISequencedEntry[];
}

interface ILane {
  pending: ISequencedEntry[];
  inFlight: number;
}

/**
 * Per-ordering-key cursors over a partition's pending messages.
 * A gated lane hands out its next batch only once every message of the
 * previous one has left flight; the unordered lane is never gated.
 */
export class OrderingSequencer {
  private lanes = new Map<string, ILane>();
  private nextSeq = 0;
  private pendingCount = 0;
  private inFlightCount = 0;

  get size() {
    return this.pendingCount;
  }

  get inFlight() {
    return this.inFlightCount;
  }

  get laneCount() {
    return this.lanes.size;
  }

  enqueue(message: Message, orderingKey = UNORDERED_KEY): ISequencedEntry {
    const entry = { message, orderingKey, seq: this.nextSeq++ };
    this.getOrCreateLane(orderingKey).pending.push(entry);
    this.pendingCount++;
    return entry;
  }

  /** Puts an in-flight entry back into its lane at its original position. */
  requeue(entry: ISequencedEntry) {
    const lane = this.getOrCreateLane(entry.orderingKey);
    this.leaveFlight(lane);

    let idx = lane.pending.findIndex((e) => e.seq > entry.seq);
    if (idx === -1) idx = lane.pending.length;
    lane.pending.splice(idx, 0, entry);
    this.pendingCount++;
  }

  /** An in-flight message of `orderingKey` was resolved. */
  release(orderingKey: string) {
    const lane = this.lanes.get(orderingKey);
    if (!lane) return;
    this.leaveFlight(lane);
    this.cleanup(orderingKey, lane);
  }

  /**
   * Takes the next batch of every dispatchable lane, ordered by the
   * publish sequence of each batch's head.
   */
  take(gated: boolean, maxBatchSize = Number.MAX_SAFE_INTEGER): IBatch[] {
    const ready: Array<[string, ILane]> = [];
    for (const [key, lane] of this.lanes) {
      if (!lane.pending.length) continue;
      if (gated && key !== UNORDERED_KEY && lane.inFlight > 0) continue;
      ready.push([key, lane]);
    }
    ready.sort(([, a], [, b]) => a.pending[0].seq - b.pending[0].seq);

    return ready.map(([orderingKey, lane]) => {
      const entries = lane.pending.splice(0, maxBatchSize);
      lane.inFlight += entries.length;
      this.inFlightCount += entries.length;
      this.pendingCount -= entries.length;
      return { orderingKey, entries };
    });
  }

  /** Removes every pending entry, leaving in-flight counts untouched. */
  drainPending(): ISequencedEntry[] {
    const drained: ISequencedEntry[] = [];
    for (const [key, lane] of this.lanes) {
      drained.push(...lane.pending.splice(0));
      this.cleanup(key, lane);
    }
    this.pendingCount = 0;
    return drained.sort((a, b) => a.seq - b.seq);
  }

  private getOrCreateLane(orderingKey: string) {
    let lane = this.lanes.get(orderingKey);
    if (!lane) {
      lane = { pending: [], inFlight: 0 };
      this.lanes.set(orderingKey, lane);
    }
    return lane;
  }

  private leaveFlight(lane: ILane) {
    if (lane.inFlight <= 0) return;
    lane.inFlight--;
    this.inFlightCount--;
  }

  private cleanup(orderingKey: string, lane: ILane) {
    if (!lane.pending.length && lane.inFlight <= 0) {
      this.lanes.delete(orderingKey);
    }
  }
}
