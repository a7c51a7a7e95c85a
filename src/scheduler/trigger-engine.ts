import cron, { type ScheduledTask as CronTask } from 'node-cron';
import { nanoid } from 'nanoid';
import { ConfigurationError, InvalidExpressionError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Opaque identifier of one registered recurrence
 */
export type TriggerHandle = string;

export type TriggerCallback = () => void;

/**
 * Recurring timer consumed by the scheduling coordinator
 */
export interface TriggerEngine {
  readonly timezone: string;
  readonly running: boolean;
  validate(expression: string): boolean;
  /** @throws InvalidExpressionError */
  register(expression: string, callback: TriggerCallback): TriggerHandle;
  cancel(handle: TriggerHandle): void;
  start(): void;
  stop(): void;
}

const FIELD_COUNT = 6;

/**
 * Six space-separated fields (seconds first) that node-cron can parse
 */
export function isValidExpression(expression: string): boolean {
  const fields = expression.trim().split(/\s+/);
  return fields.length === FIELD_COUNT && cron.validate(expression);
}

/**
 * Canonical IANA name for `timezone`
 * @throws ConfigurationError when the runtime does not know the zone
 */
export function resolveTimezone(timezone: string): string {
  try {
    return new Intl.DateTimeFormat('en-US', { timeZone: timezone }).resolvedOptions().timeZone;
  } catch (error) {
    throw new ConfigurationError(`Cannot resolve timezone "${timezone}"`, { cause: error });
  }
}

export interface NodeCronEngineOptions {
  timezone: string;
  logger?: Logger;
}

interface Registration {
  expression: string;
  job: CronTask;
}

/**
 * TriggerEngine over node-cron. Jobs stay dormant until `start()`; jobs
 * registered afterwards run straight away.
 */
export class NodeCronEngine implements TriggerEngine {
  readonly timezone: string;
  private registrations: Map<TriggerHandle, Registration> = new Map();
  private logger?: Logger;
  private started = false;

  constructor(options: NodeCronEngineOptions) {
    this.timezone = resolveTimezone(options.timezone);
    this.logger = options.logger;
  }

  get running(): boolean {
    return this.started;
  }

  validate(expression: string): boolean {
    return isValidExpression(expression);
  }

  register(expression: string, callback: TriggerCallback): TriggerHandle {
    if (!this.validate(expression)) {
      throw new InvalidExpressionError(expression, `expected ${FIELD_COUNT} fields (second minute hour day month weekday)`);
    }

    const handle = nanoid();
    let job: CronTask;
    try {
      job = cron.schedule(expression, () => this.fire(handle, callback), {
        scheduled: this.started,
        timezone: this.timezone,
        name: handle,
      });
    } catch (error) {
      throw new InvalidExpressionError(expression, errorMessage(error), { cause: error });
    }

    this.registrations.set(handle, { expression, job });
    this.logger?.debug({ handle, expression, timezone: this.timezone }, 'Registered cron trigger');
    return handle;
  }

  cancel(handle: TriggerHandle): void {
    const registration = this.registrations.get(handle);
    if (!registration) {
      return;
    }
    registration.job.stop();
    // node-cron keeps every named job in a module-level map until removed
    cron.getTasks().delete(handle);
    this.registrations.delete(handle);
    this.logger?.debug({ handle, expression: registration.expression }, 'Cancelled cron trigger');
  }

  start(): void {
    if (this.started) {
      this.logger?.warn('Trigger engine already started');
      return;
    }
    this.started = true;
    for (const registration of this.registrations.values()) {
      registration.job.start();
    }
    this.logger?.info({ triggers: this.registrations.size, timezone: this.timezone }, 'Trigger engine started');
  }

  stop(): void {
    for (const registration of this.registrations.values()) {
      registration.job.stop();
    }
    this.started = false;
  }

  private fire(handle: TriggerHandle, callback: TriggerCallback): void {
    // node-cron may still deliver a tick that was already due when stop() ran
    if (!this.started || !this.registrations.has(handle)) {
      return;
    }
    try {
      callback();
    } catch (error) {
      this.logger?.error({ handle, error: errorMessage(error) }, 'Trigger callback threw');
    }
  }
}
