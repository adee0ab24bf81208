import Redis from 'ioredis';
import { log } from '../log';

export type RedisClient = Redis;

const RECONNECT_MAX_DELAY_MS = 5000;

/** Shared connection for the history and contact stores. */
export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    connectionName: 'softphone',
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    retryStrategy: (times) => Math.min(times * 200, RECONNECT_MAX_DELAY_MS),
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('reconnecting', (delayMs: number) => {
    log.warn({ event: 'redis_reconnecting', delay_ms: delayMs }, 'redis reconnecting');
  });

  client.on('error', (error) => {
    log.error({ err: error, event: 'redis_error' }, 'redis error');
  });

  return client;
}

export async function closeRedisClient(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    log.warn({ err: error, event: 'redis_quit_failed' }, 'redis quit failed; disconnecting');
    client.disconnect();
  }
}
