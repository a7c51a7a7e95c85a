import { InvalidExpressionError } from '../errors.js';
import type { Task } from '../db/schema.js';
import { isValidExpression, type TriggerCallback, type TriggerEngine, type TriggerHandle } from '../scheduler/trigger-engine.js';
import type { NewTask, TaskStore } from '../store/task-store.js';

interface ManualRegistration {
  expression: string;
  callback: TriggerCallback;
}

/**
 * Trigger engine driven by hand: nothing fires until a test calls `fire`.
 */
export class ManualTriggerEngine implements TriggerEngine {
  readonly timezone = 'UTC';
  registrations: Map<TriggerHandle, ManualRegistration> = new Map();
  startCount = 0;
  /** Expressions for which `register` throws even though `validate` accepts them */
  rejectExpressions = new Set<string>();
  private nextHandle = 1;
  private started = false;

  get running(): boolean {
    return this.started;
  }

  validate(expression: string): boolean {
    return isValidExpression(expression);
  }

  register(expression: string, callback: TriggerCallback): TriggerHandle {
    if (!this.validate(expression) || this.rejectExpressions.has(expression)) {
      throw new InvalidExpressionError(expression, 'rejected by test engine');
    }
    const handle = `handle_${this.nextHandle++}`;
    this.registrations.set(handle, { expression, callback });
    return handle;
  }

  cancel(handle: TriggerHandle): void {
    this.registrations.delete(handle);
  }

  start(): void {
    this.started = true;
    this.startCount++;
  }

  stop(): void {
    this.started = false;
  }

  /** Fire one registration; returns false if it no longer exists or the clock is stopped */
  fire(handle: TriggerHandle): boolean {
    const registration = this.registrations.get(handle);
    if (!registration || !this.started) {
      return false;
    }
    registration.callback();
    return true;
  }

  fireAll(): void {
    for (const handle of Array.from(this.registrations.keys())) {
      this.fire(handle);
    }
  }
}

/**
 * Wraps a store so individual operations can be made to fail or yield.
 */
export class FaultyTaskStore implements TaskStore {
  failListAll = false;
  failDelete = false;
  /** Yield to the event loop before every call */
  yieldEachCall = false;
  createCalls = 0;
  private createGate: Promise<void> | null = null;
  private openCreateGate: (() => void) | null = null;

  constructor(private readonly inner: TaskStore) {}

  async create(task: NewTask): Promise<Task> {
    await this.maybeYield();
    this.createCalls++;
    const gate = this.createGate;
    const created = await this.inner.create(task);
    if (gate) {
      await gate;
    }
    return created;
  }

  /** Save records immediately but hold back the acknowledgement until `releaseCreates` */
  holdCreates(): void {
    this.createGate = new Promise((resolve) => {
      this.openCreateGate = resolve;
    });
  }

  releaseCreates(): void {
    this.openCreateGate?.();
    this.createGate = null;
    this.openCreateGate = null;
  }

  async listAll(): Promise<Task[]> {
    await this.maybeYield();
    if (this.failListAll) {
      throw new Error('database is locked');
    }
    return this.inner.listAll();
  }

  async getById(id: string): Promise<Task> {
    await this.maybeYield();
    return this.inner.getById(id);
  }

  async deleteById(id: string): Promise<void> {
    await this.maybeYield();
    if (this.failDelete) {
      throw new Error('disk I/O error');
    }
    return this.inner.deleteById(id);
  }

  private async maybeYield(): Promise<void> {
    if (this.yieldEachCall) {
      await new Promise((resolve) => setImmediate(resolve));
    }
  }
}
