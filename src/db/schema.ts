import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Tasks table - durable recurring tasks
 */
export const tasks = sqliteTable(
  'tasks',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    // Opaque reference to the work to perform; never interpreted here
    program: text('program').notNull(),
    // Six fields: second minute hour day-of-month month day-of-week
    cronExpression: text('cron_expression').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => ({
    tasksNameIdx: index('tasks_name_idx').on(table.name),
  })
);

export type Task = typeof tasks.$inferSelect;
