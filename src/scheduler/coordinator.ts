import { EventEmitter } from 'events';
import { z } from 'zod';
import type { Task } from '../db/schema.js';
import type { NewTask, TaskStore } from '../store/task-store.js';
import type { Logger } from '../utils/logger.js';
import {
  CompensationFailureError,
  InvalidExpressionError,
  InvalidTaskError,
  StoreUnavailableError,
  errorMessage,
} from '../errors.js';
import { NodeCronEngine, type TriggerEngine } from './trigger-engine.js';
import { TriggerTable } from './trigger-table.js';
import type { ClockConfig, RegistrationFailure, StartAllReport, TaskRunner } from './types.js';

const newTaskSchema = z.object({
  name: z.string().regex(/\S/, 'must not be blank'),
  program: z.string().regex(/\S/, 'must not be blank'),
  cronExpression: z.string(),
});

/**
 * Dependencies for the scheduling coordinator
 */
export interface CoordinatorDependencies {
  store: TaskStore;
  engine: TriggerEngine;
  logger: Logger;
  /** Defaults to a runner that only logs the program */
  runner?: TaskRunner;
}

export interface CreateCoordinatorOptions {
  store: TaskStore;
  clock: ClockConfig;
  logger: Logger;
  runner?: TaskRunner;
}

type CoordinatorState = 'idle' | 'loading' | 'running';

/**
 * Runner used when none is supplied: records that the program would run
 */
export function createLoggingRunner(logger: Logger): TaskRunner {
  return (task) => {
    logger.info({ taskId: task.id, name: task.name, program: task.program }, 'Running task program');
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * SchedulingCoordinator - keeps stored tasks and live cron triggers in step
 *
 * Lifecycle: construct (or `createCoordinator`) -> `startAll()` -> `addTask` /
 * `removeTask` for the life of the process -> `shutdown()`.
 *
 * Every stored task that registered successfully has exactly one entry in the
 * trigger table, and every entry belongs to a task believed to exist. A task
 * whose expression the engine rejects while loading stays in the store with
 * no trigger until it is removed.
 */
export class SchedulingCoordinator extends EventEmitter {
  private store: TaskStore;
  private engine: TriggerEngine;
  private logger: Logger;
  private runner: TaskRunner;
  private table = new TriggerTable();
  private state: CoordinatorState = 'idle';
  private loadSettled: Promise<void> = Promise.resolve();
  private addsInFlight: Set<Promise<void>> = new Set();

  constructor(deps: CoordinatorDependencies) {
    super();
    this.store = deps.store;
    this.engine = deps.engine;
    this.logger = deps.logger;
    this.runner = deps.runner ?? createLoggingRunner(deps.logger);
  }

  get timezone(): string {
    return this.engine.timezone;
  }

  /**
   * Register a trigger for every stored task, then start the clock once.
   * @throws StoreUnavailableError if the tasks cannot be listed
   */
  async startAll(): Promise<StartAllReport> {
    if (this.state !== 'idle') {
      this.logger.warn({ state: this.state }, 'Scheduler already started');
      return { scheduled: [], failed: [] };
    }

    this.state = 'loading';
    const load = this.loadAll();
    this.loadSettled = load.then(
      () => undefined,
      () => undefined
    );

    try {
      const report = await load;
      this.state = 'running';
      return report;
    } catch (error) {
      this.state = 'idle';
      throw error;
    }
  }

  /**
   * Persist a new task and schedule it. If the engine refuses the trigger the
   * record is deleted again.
   * @returns the new task's ID
   */
  async addTask(name: string, program: string, cronExpression: string): Promise<string> {
    const parsed = newTaskSchema.safeParse({ name, program, cronExpression });
    if (!parsed.success) {
      throw new InvalidTaskError(parsed.error.issues);
    }
    if (!this.engine.validate(cronExpression)) {
      throw new InvalidExpressionError(cronExpression, 'not accepted by the trigger engine');
    }

    return this.trackAdd(this.persistAndSchedule(parsed.data));
  }

  /**
   * Cancel a task's trigger (if it has one) and delete its record.
   * If the delete fails the trigger stays cancelled; the caller may retry.
   * @throws TaskNotFoundError
   */
  async removeTask(taskId: string): Promise<void> {
    await this.loadSettled;
    await this.addsSettled();

    const task = await this.store.getById(taskId);

    const handle = await this.table.take(taskId);
    if (handle === undefined) {
      this.logger.warn({ taskId, name: task.name }, 'Task has no live trigger');
    } else {
      this.engine.cancel(handle);
    }

    try {
      await this.store.deleteById(taskId);
    } catch (error) {
      this.logger.error({ taskId, name: task.name, error: errorMessage(error) }, 'Trigger cancelled but task record not deleted');
      throw error;
    }

    this.logger.info({ taskId, name: task.name }, 'Task removed');
    this.emit('taskCancelled', task);
  }

  getTask(taskId: string): Promise<Task> {
    return this.store.getById(taskId);
  }

  listTasks(): Promise<Task[]> {
    return this.store.listAll();
  }

  isScheduled(taskId: string): Promise<boolean> {
    return this.table.has(taskId);
  }

  scheduledTaskIds(): Promise<string[]> {
    return this.table.taskIds();
  }

  /**
   * Stop the clock and cancel every trigger. Stored tasks are untouched.
   */
  async shutdown(): Promise<void> {
    this.logger.info('Shutting down scheduler...');
    await this.loadSettled;
    await this.addsSettled();

    this.engine.stop();
    const handles = await this.table.drain();
    for (const handle of handles) {
      this.engine.cancel(handle);
    }

    this.state = 'idle';
    this.logger.info({ cancelled: handles.length }, 'Scheduler shut down');
  }

  // --- Private methods ---

  private async persistAndSchedule(input: NewTask): Promise<string> {
    const task = await this.store.create(input);

    try {
      await this.schedule(task);
    } catch (error) {
      this.logger.warn({ taskId: task.id, name: task.name, error: errorMessage(error) }, 'Trigger registration failed, deleting new task');
      try {
        await this.store.deleteById(task.id);
      } catch (compensationError) {
        this.logger.error(
          { taskId: task.id, name: task.name, error: errorMessage(compensationError) },
          'Failed to delete unscheduled task'
        );
        throw new CompensationFailureError(task.id, error, compensationError);
      }
      throw error;
    }

    this.logger.info({ taskId: task.id, name: task.name, cronExpression: task.cronExpression }, 'Task added');
    this.emit('taskScheduled', task);
    return task.id;
  }

  /**
   * Remember an add until it settles so removals and shutdown can wait for a
   * record that is saved but not yet in the trigger table.
   */
  private async trackAdd(adding: Promise<string>): Promise<string> {
    const settled = adding.then(
      () => undefined,
      () => undefined
    );
    this.addsInFlight.add(settled);
    try {
      return await adding;
    } finally {
      this.addsInFlight.delete(settled);
    }
  }

  private async addsSettled(): Promise<void> {
    await Promise.all(Array.from(this.addsInFlight));
  }

  private async loadAll(): Promise<StartAllReport> {
    let stored: Task[];
    try {
      stored = await this.store.listAll();
    } catch (error) {
      throw new StoreUnavailableError(`Failed to load tasks: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.info({ count: stored.length }, 'Loading scheduled tasks');

    const report: StartAllReport = { scheduled: [], failed: [] };
    for (const task of stored) {
      try {
        await this.schedule(task);
        report.scheduled.push(task.id);
        this.logger.info({ taskId: task.id, name: task.name, cronExpression: task.cronExpression }, 'Task scheduled');
      } catch (error) {
        const failure: RegistrationFailure = { taskId: task.id, name: task.name, error: toError(error) };
        report.failed.push(failure);
        this.logger.error(
          { taskId: task.id, name: task.name, cronExpression: task.cronExpression, error: failure.error.message },
          'Failed to schedule task, leaving it unscheduled'
        );
        this.emit('registrationFailed', failure);
      }
    }

    this.engine.start();
    this.logger.info({ scheduled: report.scheduled.length, failed: report.failed.length, timezone: this.timezone }, 'Scheduler started');
    return report;
  }

  /**
   * Register a trigger and record its handle. A task that already has a
   * handle (added while the initial load was running) keeps the existing one.
   */
  private async schedule(task: Task): Promise<void> {
    const snapshot: Task = { ...task };
    const handle = this.engine.register(task.cronExpression, () => this.dispatch(snapshot));

    const inserted = await this.table.insert(task.id, handle);
    if (!inserted) {
      this.engine.cancel(handle);
      this.logger.debug({ taskId: task.id }, 'Task already scheduled');
    }
  }

  private dispatch(task: Task): void {
    this.logger.debug({ taskId: task.id, name: task.name }, 'Trigger fired');
    this.emit('taskTriggered', task);

    let outcome: void | Promise<void>;
    try {
      outcome = this.runner(task);
    } catch (error) {
      this.reportRunFailure(task, error);
      return;
    }

    if (outcome instanceof Promise) {
      void outcome.catch((error: unknown) => this.reportRunFailure(task, error));
    }
  }

  private reportRunFailure(task: Task, error: unknown): void {
    this.logger.error({ taskId: task.id, name: task.name, error: errorMessage(error) }, 'Task run failed');
    this.emit('taskFailed', task, toError(error));
  }
}

/**
 * Build a coordinator on a node-cron engine for the configured timezone.
 * @throws ConfigurationError if the timezone cannot be resolved
 */
export function createCoordinator(options: CreateCoordinatorOptions): SchedulingCoordinator {
  const engine = new NodeCronEngine({ timezone: options.clock.timezone, logger: options.logger });
  return new SchedulingCoordinator({
    store: options.store,
    engine,
    logger: options.logger,
    runner: options.runner,
  });
}
