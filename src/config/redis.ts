import IORedis from 'ioredis';
import { envConfig } from './env';
import { logger } from '@/utils/logger';

const redisUrl = envConfig.QUEUE_REDIS_URL ?? 'redis://127.0.0.1:6379';

let connection: IORedis | null = null;

/** Shared queue connection, opened on first use so the HTTP side runs without Redis. */
export function getRedis(): IORedis {
  if (!connection) {
    connection = new IORedis(redisUrl, {
      // BullMQ workers block on this connection
      maxRetriesPerRequest: null,
    });
    connection.on('error', (error) => {
      logger.warn({ err: error }, 'Redis connection error');
    });
  }
  return connection;
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
