/**
 * Promise-chain lock: tasks run one at a time in submission order.
 * A failing task rejects its own caller and does not poison later tasks.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(public readonly name: string) {}

  public get size(): number {
    return this.pending;
  }

  public run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public drain(): Promise<void> {
    return this.tail;
  }

  private release(): void {
    this.pending -= 1;
  }
}
