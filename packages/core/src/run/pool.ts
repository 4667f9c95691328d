import pLimit from 'p-limit';
import { AppError } from '@moonfmt/shared';

type Task = () => Promise<void> | void;

/**
 * A fixed number of concurrent job slots.
 *
 * `execute` queues a job behind the slots; `spawn` starts a long-lived task beside them.
 * Both are fire-and-forget and tracked by {@link join}.
 */
export class WorkerPool {
  readonly size: number;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly tasks: Promise<void>[] = [];
  private readonly failures: unknown[] = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.limit = pLimit(size);
  }

  execute(task: Task): void {
    this.track(
      this.limit(async () => {
        await task();
      }),
    );
  }

  spawn(task: Task): void {
    this.track(Promise.resolve().then(task));
  }

  /**
   * Settles once every task submitted so far, and any submitted while waiting, has settled.
   */
  async join(): Promise<void> {
    let settled = 0;
    while (settled < this.tasks.length) {
      const batch = this.tasks.slice(settled);
      settled = this.tasks.length;
      await Promise.all(batch);
    }
    if (this.failures.length > 0) {
      throw new AppError('UnknownError', `${this.failures.length} pool task(s) failed`, {
        cause: this.failures[0],
      });
    }
  }

  private track(promise: Promise<void>): void {
    this.tasks.push(
      promise.then(
        () => undefined,
        (error: unknown) => {
          this.failures.push(error);
        },
      ),
    );
  }
}
