#!/usr/bin/env node
/**
 * cronward entry point
 *
 * Loads configuration, seeds the example tasks on first boot and runs every
 * stored task on its cron schedule until interrupted.
 */

import { initDatabase } from '../db/index.js';
import { createCoordinator } from '../scheduler/index.js';
import { SqliteTaskStore } from '../store/task-store.js';
import { getConfigPath, loadConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';

async function main() {
  const configPath = getConfigPath();
  const config = loadConfig(configPath);
  const logger = createLogger('cronward', config.logging);

  logger.info({ configPath, dbPath: config.database.path }, 'Starting cronward...');

  const database = initDatabase({ dbPath: config.database.path });
  const store = new SqliteTaskStore(database);

  if (config.seed.enabled) {
    const inserted = await store.seed(config.seed.tasks, logger);
    if (inserted.length > 0) {
      logger.info({ inserted }, 'Seeded example tasks');
    }
  }

  const scheduler = createCoordinator({ store, clock: config.scheduler, logger });
  const report = await scheduler.startAll();

  if (report.failed.length > 0) {
    logger.warn(
      { failed: report.failed.map((failure) => ({ taskId: failure.taskId, name: failure.name })) },
      'Some tasks could not be scheduled'
    );
  }

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Received shutdown signal');
    await scheduler.shutdown();
    database.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    stop(signal).catch((error) => {
      console.error('Failed to shut down cleanly:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('Failed to start cronward:', error);
  process.exit(1);
});
