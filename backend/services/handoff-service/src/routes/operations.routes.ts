import { FastifyInstance } from 'fastify';
import type { HandoffCradle } from '../config/dependencies';
import { CreateOperationParams } from '@handoff/sdk';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { idempotencyMiddleware } from '../middleware/idempotency.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import {
  attachCounterpartySchema,
  completePaymentSchema,
  createOperationSchema,
  deliverSchema,
  failOperationSchema,
  operationIdParamsSchema,
} from '../validators/handoff.schemas';

type ById = { Params: { id: string } };

export async function operationRoutes(fastify: FastifyInstance) {
  const { operationController: controller, config, idempotencyStore }: HandoffCradle = fastify.container.cradle;

  const authenticate = createAuthMiddleware(config.auth);
  const idempotency = idempotencyMiddleware({
    store: idempotencyStore,
    ttlSeconds: config.handoff.idempotencyTtlSeconds,
  });
  const byId = validateParams(operationIdParamsSchema);

  fastify.post<{ Body: CreateOperationParams }>(
    '/operations',
    { preHandler: [authenticate, idempotency, validate(createOperationSchema)] },
    async (request, reply) => controller.create(request, reply)
  );

  fastify.get('/operations/incoming', { preHandler: [authenticate] }, async (request, reply) =>
    controller.incoming(request, reply)
  );

  fastify.get<ById>('/operations/:id', { preHandler: [authenticate, byId] }, async (request, reply) =>
    controller.get(request, reply)
  );

  fastify.post<ById & { Body: { counterparty_actor_id: string } }>(
    '/operations/:id/counterparty',
    { preHandler: [authenticate, byId, idempotency, validate(attachCounterpartySchema)] },
    async (request, reply) => controller.attachCounterparty(request, reply)
  );

  fastify.post<ById>(
    '/operations/:id/acknowledge',
    { preHandler: [authenticate, byId, idempotency] },
    async (request, reply) => controller.acknowledge(request, reply)
  );

  fastify.post<ById & { Body: { payment_reference: string } }>(
    '/operations/:id/complete',
    { preHandler: [authenticate, byId, idempotency, validate(completePaymentSchema)] },
    async (request, reply) => controller.complete(request, reply)
  );

  fastify.post<ById & { Body: { reason: string } }>(
    '/operations/:id/fail',
    { preHandler: [authenticate, byId, idempotency, validate(failOperationSchema)] },
    async (request, reply) => controller.fail(request, reply)
  );

  fastify.post<ById>(
    '/operations/:id/cancel',
    { preHandler: [authenticate, byId, idempotency] },
    async (request, reply) => controller.cancel(request, reply)
  );

  fastify.post<ById & { Body: { email: string } }>(
    '/operations/:id/deliver',
    { preHandler: [authenticate, byId, idempotency, validate(deliverSchema)] },
    async (request, reply) => controller.deliver(request, reply)
  );
}
