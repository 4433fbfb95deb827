import winston from 'winston';
import { env } from './environment';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console line: "<time> [level] (component) message {meta}"
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = typeof component === 'string' ? ` (${component})` : '';
    const extra = Object.fromEntries(Object.entries(meta).filter(([key]) => key !== 'service'));
    const metaStr = Object.keys(extra).length ? ` ${JSON.stringify(extra)}` : '';
    return `${String(timestamp)} [${level}]${scope}: ${String(message)}${metaStr}`;
  })
);

// Create winston logger instance
export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'label-queue-api' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

// In production, also log to files
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/queue.log',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// Suppress logs in test environment
if (env.NODE_ENV === 'test') {
  logger.transports.forEach((t) => (t.silent = true));
}

/**
 * Logger tagged with the emitting component (store, lease, queue, ...)
 */
export const createComponentLogger = (component: string): winston.Logger =>
  logger.child({ component });
