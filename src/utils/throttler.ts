/**
 * Spaces out provider calls: tasks start one after another, in the order they
 * were scheduled, with at least `minIntervalMs` between two starts.
 */

export interface ThrottlerStats {
  scheduled: number;
  completed: number;
  failed: number;
}

export class RequestThrottler {
  private lastStartedAt = 0;
  private queue: Promise<void> = Promise.resolve();
  private readonly stats: ThrottlerStats = { scheduled: 0, completed: 0, failed: 0 };

  constructor(private readonly minIntervalMs: number = 0) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.stats.scheduled++;

    const result = this.queue.then(async () => {
      await this.waitForSlot();
      try {
        const value = await task();
        this.stats.completed++;
        return value;
      } catch (error) {
        this.stats.failed++;
        throw error;
      }
    });

    // The caller sees the rejection; the queue moves on to the next task.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  getStats(): ThrottlerStats {
    return { ...this.stats };
  }

  private async waitForSlot(): Promise<void> {
    const waitMs = this.minIntervalMs - (Date.now() - this.lastStartedAt);
    if (waitMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
    }
    this.lastStartedAt = Date.now();
  }
}
