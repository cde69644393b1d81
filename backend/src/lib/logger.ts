/**
 * Structured Logger
 * Provides consistent, structured logging across the application
 */

import { pino, type Logger } from 'pino';
import { loadLoggingConfig } from './config.js';

const config = loadLoggingConfig();

// Create the base logger
export const logger = pino({
  level: config.LOG_LEVEL,
  transport: config.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'send-attributes',
    version: process.env.npm_package_version || '1.0.0',
  },
});

// Create child loggers for specific modules
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
