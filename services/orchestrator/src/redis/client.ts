/**
 * Redis Connections
 * ioredis connections for the embedding cache and the FalkorDB graph store
 */

import { Redis } from 'ioredis';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password?: string | undefined;
  /** Per-command timeout in ms */
  commandTimeout?: number;
}

/**
 * Create a connection with the standard retry policy and lifecycle logging.
 * `name` labels the log lines (e.g. "Embedding Cache", "FalkorDB").
 */
export function createRedisConnection(
  name: string,
  options: RedisConnectionOptions,
  logger: RetrievalLogger = createLogger(`${name} Redis`)
): Redis {
  const client = new Redis({
    host: options.host,
    port: options.port,
    password: options.password,
    commandTimeout: options.commandTimeout,
    lazyConnect: true,
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      logger.debug('Retrying connection', { attempt: times, delayMs: delay });
      return delay;
    },
    maxRetriesPerRequest: 3,
  });

  client.on('connect', () => {
    logger.info('Connected', { host: options.host, port: options.port });
  });

  client.on('error', (err: Error) => {
    logger.error('Client error', { error: err.message });
  });

  client.on('close', () => {
    logger.debug('Connection closed');
  });

  return client;
}
