import fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import cors from '@fastify/cors';
import { AwilixContainer } from 'awilix';
import { v4 as uuidv4 } from 'uuid';
import type { HandoffCradle } from './config/dependencies';
import { errorHandler } from './middleware/error-handler';
import { idempotencyCacheHook } from './middleware/idempotency.middleware';
import { healthRoutes } from './routes/health.routes';
import { metricsRoutes } from './routes/metrics.routes';
import { operationRoutes } from './routes/operations.routes';
import { claimRoutes } from './routes/claims.routes';

export const API_PREFIX = '/api/v1';

export async function buildApp(container: AwilixContainer<HandoffCradle>): Promise<FastifyInstance> {
  const { config, idempotencyStore } = container.cradle;

  const app = fastify({
    logger: false,
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
    bodyLimit: 1048576,
  });

  app.decorate('container', container);
  app.decorateRequest('actor', null);
  app.decorateRequest('idempotencyRedisKey', null);

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  const origins = config.http.corsOrigin === '*' ? true : config.http.corsOrigin.split(',').map((o) => o.trim());
  await app.register(cors, {
    origin: origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', 'Idempotency-Key'],
    exposedHeaders: ['X-Request-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'Idempotent-Replayed'],
    maxAge: 86400,
  });

  await app.register(rateLimit, {
    max: config.http.rateLimit.max,
    timeWindow: config.http.rateLimit.windowMs,
  });

  app.addHook(
    'onSend',
    idempotencyCacheHook({ store: idempotencyStore, ttlSeconds: config.handoff.idempotencyTtlSeconds })
  );

  // routes capture the error handler when they are registered
  app.setErrorHandler(errorHandler);

  await app.register(healthRoutes);
  await app.register(metricsRoutes);
  await app.register(operationRoutes, { prefix: API_PREFIX });
  await app.register(claimRoutes, { prefix: API_PREFIX });

  return app;
}
