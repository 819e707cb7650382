import winston from 'winston';

// Config loading logs through this module, so the level cannot come from
// appConfig here; the CLI raises or lowers it once the config is validated.
const getLogLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL.toLowerCase();
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

const isTest = process.env.NODE_ENV === 'test';

const logger = winston.createLogger({
  level: getLogLevel(),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'hashtag-welcome-bot' },
  transports: isTest
    ? []
    : [
        new winston.transports.File({ filename: 'logs/error.log', level: 'error' }),
        new winston.transports.File({ filename: 'logs/combined.log' })
      ]
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    silent: isTest,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  }));
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * End the logger and wait for it to finish, so file transports are flushed
 * before the process exits.
 */
export function flushLogger(): Promise<void> {
  return new Promise((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

export default logger;
