/**
 * Destination Lock
 *
 * Serializes writes to one destination so a write's whole sequence (for the
 * file destination: maintenance, archive, append) never interleaves with
 * another write to the same instance.
 *
 * @module logger/lock
 */

import { Err, isErr, Ok, type Result } from "@logfan/shared";
import { WriteFailure } from "../errors/types.js";

interface QueuedRequest {
  resolve: () => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

/**
 * Async mutex with FIFO hand-off.
 *
 * @example
 * ```typescript
 * const lock = new DestinationLock();
 * await lock.runExclusive(async () => {
 *   await rotateIfNeeded();
 *   await append(line);
 * }, 5000);
 * ```
 */
export class DestinationLock {
  private locked = false;
  private queue: QueuedRequest[] = [];

  /**
   * Wait until the lock is free, then take it.
   *
   * With `timeoutMs`, a waiter that is still queued when the time runs out
   * leaves the queue and gets a timed-out WriteFailure.
   */
  acquire(timeoutMs?: number): Promise<Result<void, WriteFailure>> {
    // Fast path: lock is free
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(Ok(undefined));
    }

    return new Promise((resolve) => {
      const request: QueuedRequest = {
        resolve: () => {
          if (request.timeoutId) clearTimeout(request.timeoutId);
          resolve(Ok(undefined));
        },
      };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        request.timeoutId = setTimeout(() => {
          const index = this.queue.indexOf(request);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          resolve(
            Err(new WriteFailure(`Lock not acquired within ${timeoutMs}ms`, { timedOut: true }))
          );
        }, timeoutMs);
      }

      this.queue.push(request);
    });
  }

  /**
   * Release the lock, handing it to the next waiter if there is one.
   * Idempotent.
   */
  release(): void {
    if (!this.locked) {
      return;
    }

    const next = this.queue.shift();
    if (next) {
      next.resolve();
    } else {
      this.locked = false;
    }
  }

  /**
   * Number of waiters queued behind the holder.
   */
  queueLength(): number {
    return this.queue.length;
  }

  /**
   * Run `fn` while holding the lock; releases even when `fn` rejects.
   * Rejects with the acquisition failure when the lock is not obtained
   * within `timeoutMs`.
   */
  async runExclusive<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const acquired = await this.acquire(timeoutMs);
    if (isErr(acquired)) {
      throw acquired.error;
    }
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

const locks = new WeakMap<object, DestinationLock>();

/**
 * The lock belonging to a destination instance (created on first use).
 */
export function lockFor(owner: object): DestinationLock {
  let lock = locks.get(owner);
  if (!lock) {
    lock = new DestinationLock();
    locks.set(owner, lock);
  }
  return lock;
}
