import winston from 'winston';
import { bigintReplacer } from './json';

const logLevel = process.env.LOG_LEVEL || 'info';

// Records are logged as metadata, so keep each entry on one line.
export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const serviceName = service || 'unknown';
      const metaStr = Object.keys(meta).length ? JSON.stringify(meta, bigintReplacer) : '';
      return `${timestamp} [${serviceName}] ${level}: ${message} ${metaStr}`.trimEnd();
    })
  ),
  defaultMeta: { service: process.env.SERVICE_NAME || 'log-collector' },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      handleExceptions: true,
      handleRejections: true,
    }),
  ],
});

export const createServiceLogger = (serviceName: string) => {
  return logger.child({ service: serviceName });
};
