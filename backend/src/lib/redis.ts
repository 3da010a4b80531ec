/**
 * Redis Client Singleton
 * Connection used for publishing domain events over pub/sub
 */

import { Redis } from 'ioredis';
import { getConfig } from './config.js';
import { logger } from './logger.js';

// Singleton Redis client
let redisClient: Redis | null = null;

// Connection state tracking for health metrics
let connectionState: 'connecting' | 'connected' | 'disconnected' | 'error' = 'disconnected';
let lastError: string | null = null;
let errorCount = 0;
let reconnectCount = 0;

const redisLogger = logger.child({ service: 'Redis' });

/**
 * Get or create the Redis client singleton
 */
export function getRedis(): Redis {
  if (!redisClient) {
    connectionState = 'connecting';

    redisClient = new Redis(getConfig().redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      connectTimeout: 10000,
      retryStrategy: (times: number) => {
        reconnectCount++;
        if (times > 10) {
          redisLogger.error(
            { reconnectAttempts: times, totalReconnects: reconnectCount },
            'Redis connection failed after 10 retries - giving up'
          );
          connectionState = 'error';
          return null;
        }
        const delay = Math.min(times * 200, 2000);
        redisLogger.warn({ reconnectAttempt: times, delayMs: delay }, 'Redis reconnecting');
        return delay;
      },
    });

    redisClient.on('error', (error: Error) => {
      errorCount++;
      lastError = error.message;
      connectionState = 'error';
      redisLogger.error({ error: error.message, errorCount, connectionState }, 'Redis connection error');
    });

    redisClient.on('ready', () => {
      connectionState = 'connected';
      redisLogger.info({ connectionState, reconnectCount }, 'Redis ready');
    });

    redisClient.on('close', () => {
      connectionState = 'disconnected';
      redisLogger.warn({ connectionState }, 'Redis connection closed');
    });
  }

  return redisClient;
}

/**
 * Close the Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

/**
 * Get Redis health metrics for monitoring/alerting
 */
export function getRedisHealthMetrics(): {
  connectionState: string;
  lastError: string | null;
  errorCount: number;
  reconnectCount: number;
  isHealthy: boolean;
} {
  return {
    connectionState,
    lastError,
    errorCount,
    reconnectCount,
    isHealthy: connectionState === 'connected',
  };
}
