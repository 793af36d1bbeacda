export type DeliveryOutcomeStatus = "acked" | "duplicate" | "failed" | "closed";

export interface IDeliveryOutcome {
  status: DeliveryOutcomeStatus;
  messageId: string;
  topic: string;
  partitionId: number;
  attempts: number;
  error?: Error;
}

export type OutcomeListener = (outcome: IDeliveryOutcome) => void;
