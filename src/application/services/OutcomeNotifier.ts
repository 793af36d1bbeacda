import type {
  IDeliveryOutcome,
  OutcomeListener,
} from "@domain/interfaces/delivery/IDeliveryOutcome";
import type { ILogger } from "@domain/ports/ILogger";

export class OutcomeNotifier {
  private listeners = new Set<OutcomeListener>();

  constructor(private logger?: ILogger) {}

  get size() {
    return this.listeners.size;
  }

  add(listener: OutcomeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(outcome: IDeliveryOutcome) {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (error) {
        this.logger?.log(
          "Outcome listener failed.",
          { messageId: outcome.messageId, error: String(error) },
          "error"
        );
      }
    }
  }

  clear() {
    this.listeners.clear();
  }
}
