import Redis from 'ioredis';
import type { HandoffConfig } from './index';
import { logger } from '../utils/logger';

export interface RedisClients {
  /** Commands: idempotency records and health checks */
  client: Redis;
  pub: Redis;
  /** Subscriber connection; unusable for regular commands once subscribed */
  sub: Redis;
}

export function createRedisClients(redis: HandoffConfig['redis']): RedisClients {
  const options = {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(times * 200, 5000),
  };

  const clients: RedisClients = {
    client: new Redis(options),
    pub: new Redis(options),
    sub: new Redis(options),
  };

  for (const [role, connection] of Object.entries(clients)) {
    connection.on('error', (error: Error) => {
      logger.error({ err: error, role }, 'Redis connection error');
    });
  }
  return clients;
}

export async function closeRedisClients(clients: RedisClients): Promise<void> {
  await Promise.all([clients.client.quit(), clients.pub.quit(), clients.sub.quit()]);
}
