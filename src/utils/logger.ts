import pino, { type Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
  transport: isTest
    ? undefined
    : {
        target: 'pino/file',
        options: { destination: 1 },
      },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'ooda-cop',
  },
});

export type { Logger };

export const createModuleLogger = (module: string): Logger => {
  return logger.child({ module });
};

/**
 * Apply the configured level. Tests stay silent regardless.
 */
export const setLogLevel = (level: string): void => {
  if (isTest) return;
  logger.level = level;
};

export const logError = (message: string, error?: Error | unknown) => {
  if (error instanceof Error) {
    logger.error({ err: error, message }, message);
  } else if (error) {
    logger.error({ error }, message);
  } else {
    logger.error(message);
  }
};
