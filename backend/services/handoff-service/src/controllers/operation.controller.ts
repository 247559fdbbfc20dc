import { FastifyReply, FastifyRequest } from 'fastify';
import { CreateOperationParams, CreatedOperation, DeliveryResponse, OperationSnapshot } from '@handoff/sdk';
import { PendingOperationService, OperationResult } from '../services/pending-operation.service';
import { ClaimService } from '../services/claim.service';
import { requireActor } from '../middleware/auth.middleware';
import { deliveryError, relayError } from '../errors/result-errors';
import { toOperationSnapshot, toTicketView, toTransferTokenView } from '../utils/serializers';

type OperationParams = { Params: { id: string } };

function unwrap(result: OperationResult): OperationSnapshot {
  if (!result.ok) {
    throw relayError(result.error, result.state);
  }
  return toOperationSnapshot(result.operation);
}

export class OperationController {
  constructor(
    private readonly operations: PendingOperationService,
    private readonly claims: ClaimService
  ) {}

  async create(request: FastifyRequest<{ Body: CreateOperationParams }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const body = request.body;

    const result = await this.operations.createOperation(
      actor.id,
      body.kind === 'payment'
        ? {
            kind: 'payment',
            counterpartyActorId: body.counterparty_actor_id,
            subjectRef: body.subject_ref,
            amountCents: body.amount_cents,
            currency: body.currency,
            ttlSeconds: body.ttl_seconds,
          }
        : {
            kind: 'transfer',
            ticketId: body.ticket_id,
            counterpartyActorId: body.counterparty_actor_id,
            ttlSeconds: body.ttl_seconds,
          }
    );
    if (!result.ok) {
      throw relayError(result.error);
    }

    const data: CreatedOperation = {
      operation: toOperationSnapshot(result.operation),
      transfer_token: result.token ? toTransferTokenView(result.token) : null,
    };
    return reply.status(201).send({ success: true, data });
  }

  async get(request: FastifyRequest<OperationParams>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.operations.getSnapshot(request.params.id, actor.id);
    return reply.send({ success: true, data: unwrap(result) });
  }

  async incoming(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const operations = await this.operations.listIncoming(actor.id);
    return reply.send({ success: true, data: operations.map(toOperationSnapshot) });
  }

  async attachCounterparty(
    request: FastifyRequest<OperationParams & { Body: { counterparty_actor_id: string } }>,
    reply: FastifyReply
  ) {
    const actor = requireActor(request);
    const result = await this.operations.attachCounterparty(
      request.params.id,
      actor.id,
      request.body.counterparty_actor_id
    );
    return reply.send({ success: true, data: unwrap(result) });
  }

  async acknowledge(request: FastifyRequest<OperationParams>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.operations.acknowledge(request.params.id, actor.id);
    return reply.send({ success: true, data: unwrap(result) });
  }

  async complete(request: FastifyRequest<OperationParams & { Body: { payment_reference: string } }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.operations.completePayment(request.params.id, actor.id, request.body.payment_reference);
    return reply.send({ success: true, data: unwrap(result) });
  }

  async fail(request: FastifyRequest<OperationParams & { Body: { reason: string } }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.operations.fail(request.params.id, actor.id, request.body.reason);
    return reply.send({ success: true, data: unwrap(result) });
  }

  async cancel(request: FastifyRequest<OperationParams>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.operations.cancel(request.params.id, actor.id);
    return reply.send({ success: true, data: unwrap(result) });
  }

  async deliver(request: FastifyRequest<OperationParams & { Body: { email: string } }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.claims.deliverToEmail(request.params.id, actor.id, request.body.email);
    if (!result.ok) {
      throw deliveryError(result.error);
    }

    const data: DeliveryResponse = {
      branch: result.branch,
      operation: toOperationSnapshot(result.operation),
      ticket: toTicketView(result.ticket),
    };
    return reply.send({ success: true, data });
  }
}
