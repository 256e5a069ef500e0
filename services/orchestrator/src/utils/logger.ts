/**
 * Logger Utility
 * Structured logging with winston for retrieval diagnostics and error handling
 */

import winston from 'winston';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const NODE_ENV = process.env['NODE_ENV'] || 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] || (NODE_ENV === 'production' ? 'info' : 'debug');

/**
 * Minimal logger surface used by retrieval components.
 * winston child loggers satisfy it; tests pass vi.fn() mocks.
 */
export interface RetrievalLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${String(component || 'Orchestrator')}] ${level}: ${String(message)}${metaStr}`;
  })
);

// JSON format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
  }),
];

// Add file transports in production
if (NODE_ENV === 'production') {
  const logsDir = resolve(__dirname, '../../../../logs');

  transports.push(
    new winston.transports.File({
      filename: resolve(logsDir, 'orchestrator-error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: resolve(logsDir, 'orchestrator-combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  defaultMeta: { service: 'medrag-orchestrator' },
  transports,
  silent: NODE_ENV === 'test',
});

// Create child loggers for different components
export function createLogger(component: string): winston.Logger {
  return logger.child({ component });
}

// Structured error logging helper
export function logError(
  target: RetrievalLogger,
  message: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const errorObj = error instanceof Error ? error : new Error(String(error));
  target.error(message, {
    error: {
      name: errorObj.name,
      message: errorObj.message,
      stack: errorObj.stack,
    },
    ...context,
  });
}

// Performance logging helper
export function logPerformance(
  operation: string,
  durationMs: number,
  context?: Record<string, unknown>
): void {
  const level = durationMs > 5000 ? 'warn' : 'debug';
  logger[level](`Performance: ${operation}`, {
    durationMs,
    ...context,
  });
}

// API call logging helper
export function logAPICall(
  api: string,
  method: string,
  success: boolean,
  durationMs: number,
  context?: Record<string, unknown>
): void {
  logger.info(`API call: ${api}`, {
    method,
    success,
    durationMs,
    ...context,
  });
}
