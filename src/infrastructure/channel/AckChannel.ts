import type { AckMessage } from "@domain/entities/AckMessage";
import {
  AckChannelClosedError,
  AckChannelFullError,
  InvalidOptionsError,
} from "@domain/errors/PubSubError";
import type { IAckReceiver } from "@domain/ports/IAckReceiver";

export type AckChannelOverflowPolicy = "block" | "drop";

type Taker = (result: IteratorResult<AckMessage, undefined>) => void;

interface IBlockedPusher {
  ack: AckMessage;
  resolve: () => void;
  reject: (error: Error) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Bounded FIFO of acks between a subscriber and the partition resolving them.
 * `block` parks pushers until there is room, `drop` rejects them.
 */
export class AckChannel implements IAckReceiver, AsyncIterable<AckMessage> {
  private buffer: AckMessage[] = [];
  private takers: Taker[] = [];
  private pushers: IBlockedPusher[] = [];
  private closed = false;

  constructor(
    readonly capacity = 1024,
    readonly overflow: AckChannelOverflowPolicy = "block"
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidOptionsError(["capacity must be a positive integer"]);
    }
  }

  get size() {
    return this.buffer.length;
  }

  get isClosed() {
    return this.closed;
  }

  tryPush(ack: AckMessage): boolean {
    if (this.closed) throw new AckChannelClosedError();

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value: ack });
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(ack);
    return true;
  }

  push(ack: AckMessage): Promise<void> {
    if (this.closed) return Promise.reject(new AckChannelClosedError());
    if (!this.pushers.length && this.tryPush(ack)) return Promise.resolve();

    if (this.overflow === "drop") {
      return Promise.reject(new AckChannelFullError(this.capacity));
    }

    return new Promise<void>((resolve, reject) => {
      this.pushers.push({ ack, resolve, reject });
    });
  }

  take(signal?: AbortSignal): Promise<IteratorResult<AckMessage, undefined>> {
    const ack = this.buffer.shift();
    if (ack) {
      this.admitPusher();
      return Promise.resolve<IteratorResult<AckMessage, undefined>>({
        done: false,
        value: ack,
      });
    }

    if (this.closed || signal?.aborted) return Promise.resolve(DONE);

    return new Promise<IteratorResult<AckMessage, undefined>>((resolve) => {
      const taker: Taker = (result) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };
      const onAbort = () => {
        const idx = this.takers.indexOf(taker);
        if (idx !== -1) this.takers.splice(idx, 1);
        resolve(DONE);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.takers.push(taker);
    });
  }

  close() {
    if (this.closed) return;
    this.closed = true;

    for (const pusher of this.pushers.splice(0)) {
      pusher.reject(new AckChannelClosedError());
    }
    for (const taker of this.takers.splice(0)) {
      taker(DONE);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<AckMessage, undefined> {
    return { next: () => this.take() };
  }

  private admitPusher() {
    const pusher = this.pushers.shift();
    if (!pusher) return;
    this.buffer.push(pusher.ack);
    pusher.resolve();
  }
}
