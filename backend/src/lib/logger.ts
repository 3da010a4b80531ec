/**
 * Structured Logger
 * Provides consistent, structured logging across the application
 */

import { pino, type Logger } from 'pino';
import { loadLoggerSettings } from './config.js';

const settings = loadLoggerSettings();

// Create the base logger
export const logger = pino({
  level: settings.logLevel,
  transport: settings.nodeEnv === 'development'
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
    service: 'maturity-engine',
    version: process.env.npm_package_version || '1.0.0',
  },
});

// Create child loggers for specific modules
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };

export default logger;
