import { buildApp } from './app';
import { loadConfig } from './config';
import { createDatabaseConnection } from './config/database';
import { closeRedisClients, createRedisClients } from './config/redis';
import { createDependencyContainer } from './config/dependencies';
import { KnexHandoffStore } from './store/knex-handoff-store';
import { RedisStatusBus } from './services/status-publisher.service';
import { RedisIdempotencyStore } from './middleware/idempotency.middleware';
import { closeAllQueues, configureQueues } from './jobs';
import { BullExpiryScheduler, registerExpiryProcessors, scheduleExpirySweep } from './jobs/expiry.job';
import { logger } from './utils/logger';

async function startService() {
  const config = loadConfig();
  logger.info(`Starting ${config.service.name}...`);

  const db = createDatabaseConnection(config.database);
  const redis = createRedisClients(config.redis);

  const statusBus = new RedisStatusBus(redis.pub, redis.sub, logger);
  await statusBus.start();

  configureQueues(config.redis);

  const container = createDependencyContainer({
    config,
    store: new KnexHandoffStore(db),
    statusBus,
    scheduler: new BullExpiryScheduler(),
    idempotencyStore: new RedisIdempotencyStore(redis.client),
    readinessChecks: {
      database: async () => {
        await db.raw('SELECT 1');
      },
      redis: async () => {
        await redis.client.ping();
      },
    },
  });

  const { expiryEnforcer, realtimeGateway } = container.cradle;
  registerExpiryProcessors(expiryEnforcer);
  await scheduleExpirySweep(config.jobs.expirySweepCron);

  const app = await buildApp(container);
  await app.listen({ port: config.service.port, host: config.service.host });
  realtimeGateway.attach(app.server);

  logger.info(`${config.service.name} running on ${config.service.host}:${config.service.port}`);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down ${config.service.name}...`);
    try {
      await realtimeGateway.close();
      await app.close();
      await closeAllQueues();
      await statusBus.close();
      await closeRedisClients(redis);
      await db.destroy();
      logger.info(`${config.service.name} shut down successfully`);
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

startService().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start handoff-service');
  process.exit(1);
});
