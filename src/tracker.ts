/**
 * BatchDB Completion Tracker — a wait group for one batch
 *
 * begin() once per dispatched query, end() once per completion. wait()
 * settles when the outstanding count reaches zero, or rejects as soon as
 * fail() is called. The first failure wins; later ones are ignored, and
 * so is an end() without a matching begin().
 */

interface Waiter {
  resolve: () => void;
  reject: (err: unknown) => void;
}

export class CompletionTracker {
  private outstanding = 0;
  private finished = 0;
  private error: unknown = undefined;
  private hasFailed = false;
  private waiters: Waiter[] = [];

  get pending(): number {
    return this.outstanding;
  }

  get completed(): number {
    return this.finished;
  }

  get failed(): boolean {
    return this.hasFailed;
  }

  begin(): void {
    this.outstanding++;
  }

  end(): void {
    if (this.outstanding === 0) return;
    this.outstanding--;
    if (this.hasFailed) return;

    this.finished++;
    if (this.outstanding === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) waiter.resolve();
    }
  }

  fail(err: unknown): void {
    if (this.hasFailed) return;
    this.hasFailed = true;
    this.error = err;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(err);
  }

  wait(): Promise<void> {
    if (this.hasFailed) return Promise.reject(this.error);
    if (this.outstanding === 0) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
