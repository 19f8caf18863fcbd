import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const level = isTest ? 'silent' : (process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'));

// Logs go to stderr; stdout carries the rendered report.
const logger = isProduction || isTest
  ? pino({ level }, pino.destination(2))
  : pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a single scoring run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
