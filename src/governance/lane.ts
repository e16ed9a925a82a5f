/**
 * Semaphore bounding how many tasks run their stages at once. Work queued past the
 * limit starts in FIFO order as slots free up.
 */
export class TaskLane {
  private activeCount = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly maxSlots: number) {}

  get active() {
    return this.activeCount;
  }

  get queued() {
    return this.queue.length;
  }

  private async acquireSlot(): Promise<void> {
    if (this.activeCount < this.maxSlots) {
      this.activeCount++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private releaseSlot() {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; activeCount is unchanged.
      next();
      return;
    }
    this.activeCount--;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      return await work();
    } finally {
      this.releaseSlot();
    }
  }
}
