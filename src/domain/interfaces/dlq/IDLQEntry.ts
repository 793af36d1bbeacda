import type { Message } from "@domain/entities/Message";
import type { DLQReason } from "./DLQReason";

export interface IDLQEntry {
  reason: DLQReason;
  message: Message;
  topic: string;
  partitionId: number;
  attempts: number;
  error?: Error;
  deadLetteredAt: number;
}
