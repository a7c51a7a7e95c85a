import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';

const seedTaskSchema = z.object({
  name: z.string().min(1),
  program: z.string().min(1),
  cronExpression: z.string().min(1),
});

export type SeedTask = z.infer<typeof seedTaskSchema>;

/**
 * Example tasks inserted on first boot
 */
export const defaultSeedTasks: SeedTask[] = [
  { name: 'DailyBackup', program: 'Run database backup script', cronExpression: '0 0 0 * * *' },
  { name: 'HourlyCheck', program: 'Check system status', cronExpression: '0 0 * * * *' },
  { name: 'BiMinuteReport', program: 'Generate two-minute report', cronExpression: '0 */2 * * * *' },
];

/**
 * Configuration schema
 */
const configSchema = z.object({
  scheduler: z
    .object({
      /** IANA timezone every cron expression is evaluated in */
      timezone: z.string().min(1).default('Asia/Shanghai'),
    })
    .default({}),
  database: z
    .object({
      path: z.string().default('./cronward.db'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      pretty: z.boolean().default(true),
    })
    .default({}),
  seed: z
    .object({
      enabled: z.boolean().default(true),
      tasks: z.array(seedTaskSchema).default(defaultSeedTasks),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Default configuration
 */
export const defaultConfig: Config = configSchema.parse({});

/**
 * Get the config file path, honouring CRONWARD_CONFIG
 */
export function getConfigPath(): string {
  if (process.env.CRONWARD_CONFIG) {
    return process.env.CRONWARD_CONFIG;
  }
  return join(homedir(), '.cronward', 'config.json');
}

/**
 * Load configuration from file. A missing file yields the defaults; a file
 * that cannot be parsed or fails the schema is fatal.
 */
export function loadConfig(configPath?: string): Config {
  const path = configPath || getConfigPath();

  if (!existsSync(path)) {
    return defaultConfig;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read config from ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid config in ${path}: ${details}`);
  }
  return result.data;
}

