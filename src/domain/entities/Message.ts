export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export interface IMessageInit {
  value: Uint8Array;
  messageId: string;
  timestamp?: number;
  contentType?: string;
  correlationId?: string;
}

/**
 * Published payload plus its identity. Two instances with the same
 * `messageId` are the same logical message, whatever their attempt.
 */
export class Message {
  readonly value: Uint8Array;
  readonly messageId: string;
  /** Unix time in milliseconds. */
  readonly timestamp: number;
  readonly contentType: string;
  readonly correlationId?: string;

  constructor(init: IMessageInit) {
    this.value = init.value;
    this.messageId = init.messageId;
    this.timestamp = init.timestamp ?? Date.now();
    this.contentType = init.contentType ?? DEFAULT_CONTENT_TYPE;
    this.correlationId = init.correlationId;
    Object.freeze(this);
  }

  get size() {
    return this.value.byteLength;
  }
}
