/**
 * Outstanding-work tracking for a connection's background tasks.
 */

import createDebug from 'debug';

const debug = createDebug('evconn:task-group');

/**
 * Tracks running promises so a shutdown can wait for all of them.
 *
 * Tasks may be added while `wait()` is pending; they are waited for too.
 */
export class TaskGroup {
  private _pending = new Set<Promise<void>>();
  private _idle: Array<() => void> = [];

  /**
   * Number of tasks still running.
   */
  get size(): number {
    return this._pending.size;
  }

  /**
   * Start `task` and track it until it settles.
   *
   * The task body runs synchronously up to its first `await`.
   * Callers handle their own errors; a rejection reaching the group is only logged.
   */
  spawn(task: () => Promise<void>): void {
    const run = (async () => task())().catch((err: unknown) => debug('task rejected: %o', err));
    const tracked: Promise<void> = run.finally(() => {
      this._pending.delete(tracked);
      if (this._pending.size === 0) this._notifyIdle();
    });
    this._pending.add(tracked);
  }

  /**
   * Resolve once no task is running.
   */
  wait(): Promise<void> {
    if (this._pending.size === 0) return Promise.resolve();
    return new Promise((resolve) => this._idle.push(resolve));
  }

  private _notifyIdle(): void {
    const waiters = this._idle;
    this._idle = [];
    for (const resolve of waiters) resolve();
  }
}
