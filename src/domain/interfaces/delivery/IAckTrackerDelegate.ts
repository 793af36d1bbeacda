import type { PendingDelivery } from "@domain/entities/PendingDelivery";

export type SettledStatus = "acked" | "duplicate" | "failed";

/** Partition-side actions the ack tracker drives. */
export interface IAckTrackerDelegate {
  redeliver(deliveries: PendingDelivery[]): void;
  settle(delivery: PendingDelivery, status: SettledStatus, error?: Error): void;
}
