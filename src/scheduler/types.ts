import type { Task } from '../db/schema.js';

/**
 * Executes a task's program when its recurrence fires. May be invoked
 * concurrently and repeatedly for the same task.
 */
export type TaskRunner = (task: Task) => void | Promise<void>;

export interface ClockConfig {
  /** IANA timezone, e.g. "Asia/Shanghai" */
  timezone: string;
}

export interface RegistrationFailure {
  taskId: string;
  name: string;
  error: Error;
}

/**
 * Outcome of loading every stored task
 */
export interface StartAllReport {
  scheduled: string[];
  failed: RegistrationFailure[];
}

/**
 * Event types emitted by the coordinator
 */
export interface CoordinatorEvents {
  taskScheduled: (task: Task) => void;
  taskCancelled: (task: Task) => void;
  taskTriggered: (task: Task) => void;
  taskFailed: (task: Task, error: Error) => void;
  registrationFailed: (failure: RegistrationFailure) => void;
}
