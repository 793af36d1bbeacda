import type { AckMessage } from "@domain/entities/AckMessage";

/** Consumer side of an ack channel. */
export interface IAckReceiver {
  take(signal?: AbortSignal): Promise<IteratorResult<AckMessage, undefined>>;
}
