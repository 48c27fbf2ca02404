import type { HeaderLock, MaybePromise } from '../types';
import { abortReason } from './signal';

type Waiter = { kind: 'read' | 'write'; grant: () => void };

/**
 * Async reader/writer lock. Readers share the lock; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer holds back readers
 * that arrive after it.
 */
export class AsyncRwLock implements HeaderLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  get state() {
    return { readers: this.readers, writer: this.writer, waiting: this.queue.length };
  }

  async withReadLock<T>(fn: () => MaybePromise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire('read', signal);
    try {
      return await fn();
    } finally {
      this.readers--;
      this.pump();
    }
  }

  async withWriteLock<T>(fn: () => MaybePromise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire('write', signal);
    try {
      return await fn();
    } finally {
      this.writer = false;
      this.pump();
    }
  }

  private canGrant(kind: Waiter['kind']) {
    if (this.writer) return false;
    return kind === 'read' || this.readers === 0;
  }

  private take(kind: Waiter['kind']) {
    if (kind === 'read') this.readers++;
    else this.writer = true;
  }

  private acquire(kind: Waiter['kind'], signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));
    if (!this.queue.length && this.canGrant(kind)) {
      this.take(kind);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.queue.indexOf(waiter);
        if (idx >= 0) this.queue.splice(idx, 1);
        reject(signal ? abortReason(signal) : undefined);
        this.pump();
      };
      const waiter: Waiter = {
        kind,
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          this.take(kind);
          resolve();
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private pump() {
    while (this.queue.length) {
      const next = this.queue[0]!;
      if (!this.canGrant(next.kind)) return;
      this.queue.shift();
      next.grant();
      if (next.kind === 'write') return;
    }
  }
}
