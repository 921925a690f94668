/**
 * Runs submitted tasks one after another in submission order without making the caller wait.
 * After the first failure the remaining tasks are dropped. The failure stays recorded until
 * `drain` rethrows it; `settle` only waits.
 */
export class OrderedTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private failure: unknown = null;
  private failed = false;
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  enqueue(task: () => Promise<void>): void {
    this.pending += 1;
    this.tail = this.tail
      .then(async () => {
        if (!this.failed) {
          await task();
        }
      })
      .catch((error: unknown) => {
        if (!this.failed) {
          this.failed = true;
          this.failure = error;
        }
      })
      .finally(() => {
        this.pending -= 1;
      });
  }

  get hasFailed(): boolean {
    return this.failed;
  }

  /** Waits for every queued task to finish. Never throws and never clears a recorded failure. */
  async settle(): Promise<void> {
    await this.tail;
  }

  async drain(): Promise<void> {
    await this.tail;
    if (this.failed) {
      const error = this.failure;
      this.failed = false;
      this.failure = null;
      throw error;
    }
  }
}
