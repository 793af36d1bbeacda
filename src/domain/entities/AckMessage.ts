/** Subscriber-reported outcome for one message; no `error` means success. */
export interface AckMessage {
  messageId: string;
  error?: Error;
}
