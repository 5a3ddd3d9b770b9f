/**
 * Logger Configuration
 * Winston-based logging for the detector service
 */

import winston from 'winston';
import type { LogComponent } from './components';

export interface LogMeta {
  component?: LogComponent;
  [key: string]: unknown;
}

/**
 * Minimal logging surface the detection code depends on.
 * A winston logger satisfies it; tests pass jest mocks.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'pretty';
  service?: string;
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
  const prefix = component ? `[${String(component)}] ` : '';
  let msg = `${String(timestamp)} [${level.toUpperCase()}]: ${prefix}${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const format = options.format ?? 'json';

  return winston.createLogger({
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      format === 'pretty' ? prettyFormat : winston.format.json()
    ),
    defaultMeta: { service: options.service ?? 'gridsense-detector' },
    transports: [new winston.transports.Console()],
  });
}

/**
 * Flatten an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
});

export default logger;

export { logger };
