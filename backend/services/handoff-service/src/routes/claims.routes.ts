import { FastifyInstance } from 'fastify';
import type { HandoffCradle } from '../config/dependencies';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { idempotencyMiddleware } from '../middleware/idempotency.middleware';
import { validate } from '../middleware/validation.middleware';
import { claimSchema, issueTokenSchema, lookupSchema } from '../validators/handoff.schemas';

export async function claimRoutes(fastify: FastifyInstance) {
  const { transferController: controller, config, idempotencyStore }: HandoffCradle = fastify.container.cradle;

  const authenticate = createAuthMiddleware(config.auth);
  const idempotency = idempotencyMiddleware({
    store: idempotencyStore,
    ttlSeconds: config.handoff.idempotencyTtlSeconds,
  });

  fastify.post<{ Body: { ticket_id: string; ttl_seconds?: number } }>(
    '/transfers/tokens',
    { preHandler: [authenticate, idempotency, validate(issueTokenSchema)] },
    async (request, reply) => controller.issueToken(request, reply)
  );

  fastify.post<{ Body: { transfer_token: string } }>(
    '/claim',
    {
      preHandler: [authenticate, idempotency, validate(claimSchema)],
      config: {
        rateLimit: {
          max: 20,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.claim(request, reply)
  );

  fastify.post<{ Body: { email: string } }>(
    '/claims/lookup',
    {
      preHandler: [authenticate, validate(lookupSchema)],
      config: {
        rateLimit: {
          max: 30,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.lookup(request, reply)
  );

  fastify.post('/deliveries/attach', { preHandler: [authenticate, idempotency] }, async (request, reply) =>
    controller.attachDeliveries(request, reply)
  );
}
