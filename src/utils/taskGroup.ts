import { SpvError } from '../errors';

export type TaskFn = (signal: AbortSignal) => Promise<void>;

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/**
 * Structured-concurrency scope: every spawned task shares one abort signal.
 *
 * - `cancel()` aborts the signal and waits for every task to finish.
 * - The first task failure aborts the siblings, calls `onError`, and rejects `closed`
 *   once everything has drained. Failures that arrive after the signal fired are
 *   treated as teardown and ignored.
 */
export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();
  private failure: { error: unknown } | null = null;
  private settling: Promise<void> | null = null;
  private readonly done = deferred<void>();

  /** Settles after the group is cancelled or failed and all tasks have drained. */
  readonly closed: Promise<void> = this.done.promise;

  constructor(private readonly hooks?: { onError?: (error: unknown) => void }) {
    // Failures reach the owner through onError; an unobserved `closed` must not crash the process.
    this.closed.catch(() => undefined);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled() {
    return this.controller.signal.aborted;
  }

  /** Number of tasks still running. */
  get size() {
    return this.tasks.size;
  }

  /**
   * Start `fn` as a child of this group. The returned promise settles when the
   * task ends and never rejects; failures go to the group.
   */
  spawn(fn: TaskFn): Promise<void> {
    if (this.controller.signal.aborted) {
      throw new SpvError('ABORTED', 'Task group is cancelled');
    }
    const task: Promise<void> = Promise.resolve()
      .then(() => fn(this.controller.signal))
      .catch((error: unknown) => this.fail(error))
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
    return task;
  }

  /**
   * Abort every task and wait for all of them to finish.
   */
  async cancel(reason?: unknown): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason ?? new SpvError('ABORTED', 'Task group cancelled'));
    }
    await this.settle();
  }

  private fail(error: unknown) {
    if (this.controller.signal.aborted) return;
    this.failure = { error };
    this.hooks?.onError?.(error);
    this.controller.abort(error);
    void this.settle();
  }

  private settle(): Promise<void> {
    if (!this.settling) {
      this.settling = (async () => {
        while (this.tasks.size) {
          await Promise.allSettled([...this.tasks]);
        }
        if (this.failure) this.done.reject(this.failure.error);
        else this.done.resolve();
      })();
    }
    return this.settling;
  }
}
