import pino from 'pino';

/**
 * The slice of pino's API the scheduler logs through
 */
export type Logger = Pick<pino.Logger, 'info' | 'warn' | 'error' | 'debug'>;

export interface LoggerSettings {
  level?: pino.LevelWithSilent;
  pretty?: boolean;
}

/**
 * Create a logger instance
 */
export function createLogger(name: string, settings: LoggerSettings = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== 'production';
  const pretty = settings.pretty ?? isDev;

  return pino({
    name,
    level: process.env.LOG_LEVEL || settings.level || (isDev ? 'debug' : 'info'),
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
