/**
 * cronward
 *
 * Durable recurring tasks: task records live in SQLite, their cron triggers
 * live in memory and are rebuilt from the store on startup.
 *
 * @example
 * ```typescript
 * import { initDatabase, SqliteTaskStore, createCoordinator, createLogger } from 'cronward';
 *
 * const logger = createLogger('cronward');
 * const store = new SqliteTaskStore(initDatabase({ dbPath: './cronward.db' }));
 * const scheduler = createCoordinator({ store, clock: { timezone: 'Asia/Shanghai' }, logger });
 * await scheduler.startAll();
 * const id = await scheduler.addTask('Ping', 'ping-upstream', '30 * * * * *');
 * ```
 */

// ============================================================================
// Scheduler
// ============================================================================
export * from './scheduler/index.js';

// ============================================================================
// Store & database
// ============================================================================
export { SqliteTaskStore, type TaskStore, type NewTask } from './store/task-store.js';
export {
  initDatabase,
  createInMemoryDatabase,
  tasks,
  type DatabaseConfig,
  type DatabaseInstance,
  type Task,
} from './db/index.js';

// ============================================================================
// Errors
// ============================================================================
export {
  ConfigurationError,
  StoreUnavailableError,
  InvalidExpressionError,
  TaskNotFoundError,
  InvalidTaskError,
  CompensationFailureError,
} from './errors.js';

// ============================================================================
// Utilities
// ============================================================================
export { createLogger, createSilentLogger, type Logger, type LoggerSettings } from './utils/logger.js';
export { loadConfig, getConfigPath, defaultConfig, defaultSeedTasks, type Config, type SeedTask } from './utils/config.js';
