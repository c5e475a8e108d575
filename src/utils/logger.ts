import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'focus-api',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export interface ErrorContext {
  method?: string;
  url?: string;
  sessionId?: string;
  [key: string]: unknown;
}

export function logError(error: unknown, context?: ErrorContext, customLogger?: Logger): void {
  const log = customLogger ?? logger;

  if (error instanceof Error) {
    log.error(
      {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
        ...context,
      },
      `Error: ${error.message}`
    );
    return;
  }

  log.error({ error: String(error), ...context }, 'Non-error value thrown');
}
