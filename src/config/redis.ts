import Redis from 'ioredis';
import { logger } from './logger';

const REDIS_HOST = process.env.REDIS_HOST || 'localhost';
const REDIS_PORT = parseInt(process.env.REDIS_PORT || '6379', 10);
const REDIS_DB = parseInt(process.env.REDIS_DB || '0', 10);

export const redis = new Redis({
  host: REDIS_HOST,
  port: REDIS_PORT,
  db: REDIS_DB,
  maxRetriesPerRequest: 3,
  lazyConnect: true,
});

redis.on('connect', () => {
  logger.info({ host: REDIS_HOST, port: REDIS_PORT }, 'connected to Redis');
});

redis.on('error', (err) => {
  logger.error({ err }, 'Redis error');
});

/**
 * Initialize Redis: connect and verify the server answers
 */
export async function initRedis(): Promise<void> {
  if (redis.status === 'wait') {
    await redis.connect();
  }
  const result = await redis.ping();
  if (result !== 'PONG') {
    throw new Error('Redis ping failed');
  }
  logger.info('Redis initialized');
}
