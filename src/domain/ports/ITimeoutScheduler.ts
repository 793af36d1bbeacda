export interface ITimeoutScheduler {
  schedule(task: () => void, delayMs: number): void;
  size(): number;
  stop(): void;
}
