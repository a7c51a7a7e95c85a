import { asc, eq, sql } from 'drizzle-orm';
import { nanoid } from 'nanoid';
import type { DatabaseInstance } from '../db/index.js';
import { tasks, type Task } from '../db/schema.js';
import { TaskNotFoundError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Input for creating a task; the store assigns `id` and `createdAt`
 */
export interface NewTask {
  name: string;
  program: string;
  cronExpression: string;
}

/**
 * Durable task records as seen by the scheduling coordinator
 */
export interface TaskStore {
  create(task: NewTask): Promise<Task>;
  listAll(): Promise<Task[]>;
  /** @throws TaskNotFoundError */
  getById(id: string): Promise<Task>;
  /** @throws TaskNotFoundError when no record was deleted */
  deleteById(id: string): Promise<void>;
}

/**
 * TaskStore backed by SQLite through Drizzle
 */
export class SqliteTaskStore implements TaskStore {
  constructor(private readonly database: DatabaseInstance) {}

  async create(task: NewTask): Promise<Task> {
    const record: Task = {
      id: nanoid(),
      name: task.name,
      program: task.program,
      cronExpression: task.cronExpression,
      createdAt: new Date(),
    };

    this.database.db.insert(tasks).values(record).run();
    return record;
  }

  async listAll(): Promise<Task[]> {
    return this.database.db.select().from(tasks).orderBy(asc(tasks.createdAt)).all();
  }

  async getById(id: string): Promise<Task> {
    const task = this.database.db.select().from(tasks).where(eq(tasks.id, id)).get();
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  async deleteById(id: string): Promise<void> {
    const result = this.database.db.delete(tasks).where(eq(tasks.id, id)).run();
    if (result.changes === 0) {
      throw new TaskNotFoundError(id);
    }
  }

  /**
   * Insert each seed task unless a task with the same name already exists.
   * Safe to run on every boot. Returns the names that were inserted.
   */
  async seed(seeds: NewTask[], logger: Logger): Promise<string[]> {
    const inserted: string[] = [];

    for (const seed of seeds) {
      const existing = this.database.db
        .select({ count: sql<number>`count(*)` })
        .from(tasks)
        .where(eq(tasks.name, seed.name))
        .get();

      if ((existing?.count ?? 0) > 0) {
        continue;
      }

      try {
        await this.create(seed);
        inserted.push(seed.name);
        logger.info({ name: seed.name }, 'Inserted seed task');
      } catch (error) {
        logger.error({ name: seed.name, error: errorMessage(error) }, 'Failed to insert seed task');
      }
    }

    return inserted;
  }
}
