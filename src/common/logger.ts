/**
 * Diagnostic logging.
 *
 * Everything goes to stderr so that stdout only carries command output.
 * Level comes from LOG_LEVEL and can be raised at runtime with setLogLevel.
 */
import * as winston from 'winston';

const baseLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
      const scope = component ? ` [${component}]` : '';
      return `${timestamp} [${level}]${scope}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`.trimEnd();
    })
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
    })
  ]
});

export type Logger = winston.Logger;

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}

export function setLogLevel(level: string): void {
  baseLogger.level = level;
}

export function getLogLevel(): string {
  return baseLogger.level;
}
