import type { TriggerHandle } from './trigger-engine.js';

/**
 * Promise-chain mutual exclusion. Callers queue in arrival order; a failing
 * critical section releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Task ID -> trigger handle mapping. Every read and write goes through one
 * lock; never hold it across store or engine calls.
 */
export class TriggerTable {
  private handles: Map<string, TriggerHandle> = new Map();
  private lock = new Mutex();

  /**
   * Insert unless the task already has a handle. Returns false when an entry
   * already existed; the caller owns (and must cancel) the rejected handle.
   */
  insert(taskId: string, handle: TriggerHandle): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (this.handles.has(taskId)) {
        return false;
      }
      this.handles.set(taskId, handle);
      return true;
    });
  }

  /**
   * Remove and return the handle for a task, if any
   */
  take(taskId: string): Promise<TriggerHandle | undefined> {
    return this.lock.runExclusive(() => {
      const handle = this.handles.get(taskId);
      this.handles.delete(taskId);
      return handle;
    });
  }

  has(taskId: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.handles.has(taskId));
  }

  taskIds(): Promise<string[]> {
    return this.lock.runExclusive(() => Array.from(this.handles.keys()));
  }

  /**
   * Empty the table, returning every handle it held
   */
  drain(): Promise<TriggerHandle[]> {
    return this.lock.runExclusive(() => {
      const handles = Array.from(this.handles.values());
      this.handles.clear();
      return handles;
    });
  }
}
