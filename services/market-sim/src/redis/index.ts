import { Redis } from 'ioredis';
import { logger } from '../logger.js';

let publisher: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('connect',    () => logger.info({ label }, 'redis connect'));
  client.on('ready',      () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',        () => logger.warn({ label }, 'redis end'));
  client.on('error',      (err) => logger.error({ label, err }, 'redis error'));
}

export function getPublisher(redisUrl: string): Redis {
  if (!publisher) {
    publisher = new Redis(redisUrl, {
      maxRetriesPerRequest: null,
      enableAutoPipelining: true,
    });
    attachLoggers(publisher, 'publisher');
  }
  return publisher;
}

export async function shutdownRedis(): Promise<void> {
  const client = publisher;
  publisher = null;
  if (!client) return;
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err }, 'redis quit failed; disconnecting');
    client.disconnect();
  }
}
