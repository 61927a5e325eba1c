import { pino } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTestRun = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

const logger = pino({
  level: isTestRun
    ? 'silent'
    : process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  redact: ['token', 'apiKey', 'api_key', '*.token', '*.apiKey'],
  ...(isProduction || isTestRun
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = typeof logger;

/**
 * Creates a child logger scoped to a background task.
 */
export function createTaskLogger(
  taskId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ task_id: taskId, ...extra });
}

export default logger;
