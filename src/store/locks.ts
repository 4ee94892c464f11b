import type { CalendarDate, SlotTime } from '../domain/types';

type LockKey = string & { readonly __lockKey: unique symbol };

/**
 * Per-slot mutual exclusion. Callers for the same slot run one at a time,
 * in arrival order; different slots never wait on each other.
 */
export class LockManager {
  private tails = new Map<LockKey, Promise<void>>();

  private createKey(date: CalendarDate, time: SlotTime): LockKey {
    return `${date}|${time}` as LockKey;
  }

  get size(): number {
    return this.tails.size;
  }

  async acquire<T>(date: CalendarDate, time: SlotTime, fn: () => Promise<T>): Promise<T> {
    const key = this.createKey(date, time);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    try {
      return await fn();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
