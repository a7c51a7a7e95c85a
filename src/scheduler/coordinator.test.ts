import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { createInMemoryDatabase, type DatabaseInstance, type Task } from '../db/index.js';
import {
  CompensationFailureError,
  ConfigurationError,
  InvalidExpressionError,
  InvalidTaskError,
  StoreUnavailableError,
  TaskNotFoundError,
} from '../errors.js';
import { SqliteTaskStore } from '../store/task-store.js';
import { FaultyTaskStore, ManualTriggerEngine } from '../test-utils/fakes.js';
import { createSilentLogger } from '../utils/logger.js';
import { SchedulingCoordinator, createCoordinator } from './coordinator.js';
import type { RegistrationFailure } from './types.js';

describe('SchedulingCoordinator', () => {
  let database: DatabaseInstance;
  let sqliteStore: SqliteTaskStore;
  let store: FaultyTaskStore;
  let engine: ManualTriggerEngine;
  let runner: Mock<(task: Task) => void>;
  let coordinator: SchedulingCoordinator;

  beforeEach(() => {
    database = createInMemoryDatabase();
    sqliteStore = new SqliteTaskStore(database);
    store = new FaultyTaskStore(sqliteStore);
    engine = new ManualTriggerEngine();
    runner = vi.fn<(task: Task) => void>();
    coordinator = new SchedulingCoordinator({ store, engine, logger: createSilentLogger(), runner });
  });

  afterEach(() => {
    database.close();
  });

  describe('createCoordinator', () => {
    it('should build a coordinator for a known timezone', () => {
      const created = createCoordinator({
        store,
        clock: { timezone: 'Asia/Shanghai' },
        logger: createSilentLogger(),
      });

      expect(created.timezone).toBe('Asia/Shanghai');
    });

    it('should throw ConfigurationError for an unknown timezone', () => {
      expect(() =>
        createCoordinator({ store, clock: { timezone: 'Not/AZone' }, logger: createSilentLogger() })
      ).toThrow(ConfigurationError);
    });
  });

  describe('startAll', () => {
    it('should register one trigger per stored task and start the clock once', async () => {
      const a = await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      const b = await sqliteStore.create({ name: 'B', program: 'b', cronExpression: '0 */2 * * * *' });

      const report = await coordinator.startAll();

      expect(report.scheduled.sort()).toEqual([a.id, b.id].sort());
      expect(report.failed).toEqual([]);
      expect((await coordinator.scheduledTaskIds()).sort()).toEqual([a.id, b.id].sort());
      expect(engine.registrations.size).toBe(2);
      expect(engine.startCount).toBe(1);
    });

    it('should start the clock even when the store is empty', async () => {
      const report = await coordinator.startAll();

      expect(report).toEqual({ scheduled: [], failed: [] });
      expect(engine.running).toBe(true);
    });

    it('should skip tasks whose trigger cannot be registered', async () => {
      const good = await sqliteStore.create({ name: 'Good', program: 'g', cronExpression: '0 * * * * *' });
      const bad = await sqliteStore.create({ name: 'Bad', program: 'b', cronExpression: 'every tuesday' });
      const failures: RegistrationFailure[] = [];
      coordinator.on('registrationFailed', (failure: RegistrationFailure) => failures.push(failure));

      const report = await coordinator.startAll();

      expect(report.scheduled).toEqual([good.id]);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0].taskId).toBe(bad.id);
      expect(report.failed[0].name).toBe('Bad');
      expect(report.failed[0].error).toBeInstanceOf(InvalidExpressionError);
      expect(failures.map((failure) => failure.taskId)).toEqual([bad.id]);
      expect(await coordinator.isScheduled(bad.id)).toBe(false);
      expect(await coordinator.isScheduled(good.id)).toBe(true);
      expect((await sqliteStore.listAll()).map((task) => task.id)).toContain(bad.id);
      expect(engine.startCount).toBe(1);
    });

    it('should throw StoreUnavailableError when the load fails', async () => {
      store.failListAll = true;

      await expect(coordinator.startAll()).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(engine.running).toBe(false);
      expect(await coordinator.scheduledTaskIds()).toEqual([]);
    });

    it('should allow a retry after a failed load', async () => {
      await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      store.failListAll = true;
      await expect(coordinator.startAll()).rejects.toThrow('Failed to load tasks: database is locked');

      store.failListAll = false;
      const report = await coordinator.startAll();

      expect(report.scheduled).toHaveLength(1);
      expect(engine.startCount).toBe(1);
    });

    it('should not load twice', async () => {
      await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      await coordinator.startAll();

      const second = await coordinator.startAll();

      expect(second).toEqual({ scheduled: [], failed: [] });
      expect(engine.registrations.size).toBe(1);
      expect(engine.startCount).toBe(1);
    });
  });

  describe('addTask', () => {
    it('should persist the task and map its trigger', async () => {
      await coordinator.startAll();

      const id = await coordinator.addTask('T', 'P', '* * * * * *');

      const stored = await sqliteStore.listAll();
      expect(stored.map((task) => task.name)).toEqual(['T']);
      expect(stored[0].id).toBe(id);
      expect(await coordinator.scheduledTaskIds()).toEqual([id]);
    });

    it('should emit taskScheduled', async () => {
      const scheduled = vi.fn();
      coordinator.on('taskScheduled', scheduled);

      const id = await coordinator.addTask('T', 'P', '* * * * * *');

      expect(scheduled).toHaveBeenCalledTimes(1);
      expect(scheduled.mock.calls[0][0]).toMatchObject({ id, name: 'T', program: 'P' });
    });

    it('should reject an invalid expression without touching the store', async () => {
      await expect(coordinator.addTask('T', 'P', '0 9 * * *')).rejects.toBeInstanceOf(InvalidExpressionError);

      expect(store.createCalls).toBe(0);
      expect(await sqliteStore.listAll()).toEqual([]);
    });

    it('should reject a blank name or program', async () => {
      await expect(coordinator.addTask('  ', 'P', '* * * * * *')).rejects.toBeInstanceOf(InvalidTaskError);
      await expect(coordinator.addTask('T', '', '* * * * * *')).rejects.toThrow('program: must not be blank');

      expect(store.createCalls).toBe(0);
    });

    it('should delete the new record when the engine refuses the trigger', async () => {
      engine.rejectExpressions.add('0 0 12 * * *');

      await expect(coordinator.addTask('Noon', 'lunch', '0 0 12 * * *')).rejects.toBeInstanceOf(InvalidExpressionError);

      expect(store.createCalls).toBe(1);
      expect(await sqliteStore.listAll()).toEqual([]);
      expect(await coordinator.scheduledTaskIds()).toEqual([]);
    });

    it('should report a failed rollback as CompensationFailureError', async () => {
      engine.rejectExpressions.add('0 0 12 * * *');
      store.failDelete = true;

      const error = await coordinator.addTask('Noon', 'lunch', '0 0 12 * * *').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CompensationFailureError);
      const stored = await sqliteStore.listAll();
      expect(stored).toHaveLength(1);
      if (error instanceof CompensationFailureError) {
        expect(error.taskId).toBe(stored[0].id);
        expect(error.registrationError).toBeInstanceOf(InvalidExpressionError);
      }
    });

    it('should keep registrations dormant until startAll', async () => {
      const id = await coordinator.addTask('T', 'P', '* * * * * *');

      engine.fireAll();
      expect(runner).not.toHaveBeenCalled();

      await coordinator.startAll();
      engine.fireAll();

      expect(runner).toHaveBeenCalledTimes(1);
      expect(runner.mock.calls[0][0].id).toBe(id);
      expect(engine.registrations.size).toBe(1);
    });
  });

  describe('removeTask', () => {
    it('should cancel the trigger and delete the record', async () => {
      await coordinator.startAll();
      const id = await coordinator.addTask('T', 'P', '* * * * * *');
      const cancelled = vi.fn();
      coordinator.on('taskCancelled', cancelled);

      await coordinator.removeTask(id);

      expect(engine.registrations.size).toBe(0);
      expect(await coordinator.isScheduled(id)).toBe(false);
      expect(await sqliteStore.listAll()).toEqual([]);
      expect(cancelled).toHaveBeenCalledTimes(1);
    });

    it('should remove a task that failed registration during load', async () => {
      const bad = await sqliteStore.create({ name: 'Bad', program: 'b', cronExpression: 'every tuesday' });
      await coordinator.startAll();

      await coordinator.removeTask(bad.id);

      expect(await sqliteStore.listAll()).toEqual([]);
    });

    it('should throw TaskNotFoundError for an unknown id and change nothing', async () => {
      await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      await coordinator.startAll();
      const before = await coordinator.scheduledTaskIds();

      await expect(coordinator.removeTask('no-such-task')).rejects.toBeInstanceOf(TaskNotFoundError);

      expect(await coordinator.scheduledTaskIds()).toEqual(before);
      expect(await sqliteStore.listAll()).toHaveLength(1);
      expect(engine.registrations.size).toBe(1);
    });

    it('should leave the task persisted but unscheduled when the delete fails', async () => {
      await coordinator.startAll();
      const id = await coordinator.addTask('T', 'P', '* * * * * *');
      store.failDelete = true;

      await expect(coordinator.removeTask(id)).rejects.toThrow('disk I/O error');

      expect(await coordinator.isScheduled(id)).toBe(false);
      expect(engine.registrations.size).toBe(0);
      expect((await sqliteStore.getById(id)).name).toBe('T');

      store.failDelete = false;
      await coordinator.removeTask(id);
      expect(await sqliteStore.listAll()).toEqual([]);
    });

    it('should not leave a trigger behind when removed while the add is still finishing', async () => {
      await coordinator.startAll();
      store.holdCreates();

      const adding = coordinator.addTask('T', 'P', '* * * * * *');
      await vi.waitFor(async () => expect(await sqliteStore.listAll()).toHaveLength(1));
      const [saved] = await sqliteStore.listAll();
      const removing = coordinator.removeTask(saved.id);
      store.releaseCreates();

      const [id] = await Promise.all([adding, removing]);

      expect(id).toBe(saved.id);
      expect(await coordinator.scheduledTaskIds()).toEqual([]);
      expect(engine.registrations.size).toBe(0);
      expect(await sqliteStore.listAll()).toEqual([]);
    });

    it('should wait for an in-flight load before touching the mapping', async () => {
      const a = await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      store.yieldEachCall = true;

      const loading = coordinator.startAll();
      const removing = coordinator.removeTask(a.id);
      await Promise.all([loading, removing]);

      expect(await coordinator.scheduledTaskIds()).toEqual([]);
      expect(engine.registrations.size).toBe(0);
      expect(await sqliteStore.listAll()).toEqual([]);
    });
  });

  describe('concurrency', () => {
    it('should stay consistent under concurrent adds and removes', async () => {
      store.yieldEachCall = true;
      await coordinator.startAll();

      const ids = await Promise.all(
        Array.from({ length: 25 }, (_, i) => coordinator.addTask(`Task ${i}`, `program-${i}`, '* * * * * *'))
      );

      expect(new Set(ids).size).toBe(25);
      expect((await coordinator.scheduledTaskIds()).sort()).toEqual([...ids].sort());

      await Promise.all(ids.map((id) => coordinator.removeTask(id)));

      expect(await coordinator.scheduledTaskIds()).toEqual([]);
      expect(engine.registrations.size).toBe(0);
      expect(await sqliteStore.listAll()).toEqual([]);
    });

    it('should not double-register a task added while the load is running', async () => {
      store.yieldEachCall = true;

      const [id, report] = await Promise.all([
        coordinator.addTask('T', 'P', '* * * * * *'),
        coordinator.startAll(),
      ]);

      expect(await coordinator.scheduledTaskIds()).toEqual([id]);
      expect(engine.registrations.size).toBe(1);
      expect(report.failed).toEqual([]);
    });
  });

  describe('firing', () => {
    it('should run each task with its own identity', async () => {
      const a = await sqliteStore.create({ name: 'A', program: 'prog-a', cronExpression: '* * * * * *' });
      const b = await sqliteStore.create({ name: 'B', program: 'prog-b', cronExpression: '0 * * * * *' });
      await coordinator.startAll();

      engine.fireAll();

      const fired = runner.mock.calls.map(([task]) => `${task.id}:${task.name}:${task.program}`).sort();
      expect(fired).toEqual([`${a.id}:A:prog-a`, `${b.id}:B:prog-b`].sort());
    });

    it('should keep firing after add and remove of another task', async () => {
      const keep = await sqliteStore.create({ name: 'Keep', program: 'k', cronExpression: '0 * * * * *' });
      await coordinator.startAll();
      const [keepHandle] = Array.from(engine.registrations.keys());

      const other = await coordinator.addTask('Other', 'o', '* * * * * *');
      await coordinator.removeTask(other);

      expect(engine.fire(keepHandle)).toBe(true);
      expect(runner).toHaveBeenCalledTimes(1);
      expect(runner.mock.calls[0][0].id).toBe(keep.id);
    });

    it('should stop firing a removed task', async () => {
      const id = await coordinator.addTask('T', 'P', '* * * * * *');
      await coordinator.startAll();
      const [handle] = Array.from(engine.registrations.keys());

      await coordinator.removeTask(id);

      expect(engine.fire(handle)).toBe(false);
      expect(runner).not.toHaveBeenCalled();
    });

    it('should emit taskTriggered for every firing', async () => {
      await coordinator.addTask('T', 'P', '* * * * * *');
      await coordinator.startAll();
      const triggered = vi.fn();
      coordinator.on('taskTriggered', triggered);

      engine.fireAll();
      engine.fireAll();

      expect(triggered).toHaveBeenCalledTimes(2);
    });

    it('should contain a runner that throws', async () => {
      runner.mockImplementation(() => {
        throw new Error('exit code 1');
      });
      const failed = vi.fn();
      coordinator.on('taskFailed', failed);
      await coordinator.addTask('T', 'P', '* * * * * *');
      await coordinator.startAll();

      expect(() => engine.fireAll()).not.toThrow();
      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0][1]).toEqual(new Error('exit code 1'));
    });

    it('should report a runner that rejects', async () => {
      const asyncCoordinator = new SchedulingCoordinator({
        store,
        engine,
        logger: createSilentLogger(),
        runner: async () => {
          throw new Error('timed out');
        },
      });
      const failed = vi.fn();
      asyncCoordinator.on('taskFailed', failed);
      await asyncCoordinator.addTask('T', 'P', '* * * * * *');
      await asyncCoordinator.startAll();

      engine.fireAll();
      await vi.waitFor(() => expect(failed).toHaveBeenCalledTimes(1));

      expect(failed.mock.calls[0][1]).toEqual(new Error('timed out'));
    });
  });

  describe('shutdown', () => {
    it('should cancel every trigger and keep the records', async () => {
      await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      await coordinator.addTask('B', 'b', '0 * * * * *');
      await coordinator.startAll();

      await coordinator.shutdown();

      expect(engine.running).toBe(false);
      expect(engine.registrations.size).toBe(0);
      expect(await coordinator.scheduledTaskIds()).toEqual([]);
      expect(await coordinator.listTasks()).toHaveLength(2);
    });

    it('should wait for an add in flight before cancelling triggers', async () => {
      await coordinator.startAll();
      store.holdCreates();

      const adding = coordinator.addTask('T', 'P', '* * * * * *');
      await vi.waitFor(async () => expect(await sqliteStore.listAll()).toHaveLength(1));
      const stopping = coordinator.shutdown();
      store.releaseCreates();
      await Promise.all([adding, stopping]);

      expect(engine.registrations.size).toBe(0);
      expect(await coordinator.scheduledTaskIds()).toEqual([]);
      expect(await coordinator.listTasks()).toHaveLength(1);
    });

    it('should allow starting again after shutdown', async () => {
      await sqliteStore.create({ name: 'A', program: 'a', cronExpression: '* * * * * *' });
      await coordinator.startAll();
      await coordinator.shutdown();

      const report = await coordinator.startAll();

      expect(report.scheduled).toHaveLength(1);
      expect(engine.running).toBe(true);
    });
  });

  describe('getTask', () => {
    it('should return stored tasks and reject unknown ids', async () => {
      const id = await coordinator.addTask('T', 'P', '* * * * * *');

      expect((await coordinator.getTask(id)).program).toBe('P');
      await expect(coordinator.getTask('missing')).rejects.toBeInstanceOf(TaskNotFoundError);
    });
  });
});
