export interface IPriorityQueue<Data> {
  enqueue(data: Data, priority?: number): void;
  dequeue(): Data | undefined;
  peek(): Data | undefined;
  size(): number;
  clear(): void;
}
