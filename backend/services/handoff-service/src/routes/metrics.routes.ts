import { FastifyInstance } from 'fastify';
import { register } from '../utils/metrics';

export async function metricsRoutes(fastify: FastifyInstance) {
  fastify.get('/metrics', async (_request, reply) => {
    const metrics = await register.metrics();
    return reply.header('Content-Type', register.contentType).send(metrics);
  });
}
