import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
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
 * Creates a child logger scoped to a single generation run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
