import { FastifyInstance } from 'fastify';
import type { HandoffCradle } from '../config/dependencies';

export async function healthRoutes(fastify: FastifyInstance) {
  const { readinessChecks, config }: HandoffCradle = fastify.container.cradle;

  const runChecks = async () => {
    const results: Record<string, { healthy: boolean; latency: number }> = {};
    for (const [name, check] of Object.entries(readinessChecks)) {
      const start = Date.now();
      try {
        await check();
        results[name] = { healthy: true, latency: Date.now() - start };
      } catch (error) {
        fastify.log.error({ err: error, check: name }, 'Health check failed');
        results[name] = { healthy: false, latency: Date.now() - start };
      }
    }
    return results;
  };

  fastify.get('/health/live', async (_request, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  fastify.get('/health/ready', async (_request, reply) => {
    const checks = await runChecks();
    const ready = Object.values(checks).every((check) => check.healthy);
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  fastify.get('/health', async (_request, reply) => {
    const checks = await runChecks();
    const healthy = Object.values(checks).every((check) => check.healthy);
    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'healthy' : 'unhealthy',
      service: config.service.name,
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime(),
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
