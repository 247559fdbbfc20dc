import { FastifyReply, FastifyRequest } from 'fastify';
import { AttachDeliveriesResponse, ClaimResponse, LookupResponse } from '@handoff/sdk';
import { TransferTokenService } from '../services/transfer-token.service';
import { ClaimService } from '../services/claim.service';
import { requireActor } from '../middleware/auth.middleware';
import { CLAIM_ERRORS, relayError } from '../errors/result-errors';
import { toTicketView, toTransferTokenView } from '../utils/serializers';

export class TransferController {
  constructor(
    private readonly tokens: TransferTokenService,
    private readonly claims: ClaimService
  ) {}

  async issueToken(request: FastifyRequest<{ Body: { ticket_id: string; ttl_seconds?: number } }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.tokens.issue(request.body.ticket_id, actor.id, request.body.ttl_seconds);
    if (!result.ok) {
      throw relayError(result.error);
    }
    return reply.status(201).send({ success: true, data: toTransferTokenView(result.token) });
  }

  /**
   * Claim responses carry the ticket or a claim error code in the body
   * rather than the standard envelope.
   */
  async claim(request: FastifyRequest<{ Body: { transfer_token: string } }>, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.claims.claimByToken(request.body.transfer_token, actor.id);

    if (!result.ok) {
      const mapped = CLAIM_ERRORS[result.error];
      const body: ClaimResponse = { ticket: null, error: { code: mapped.code, message: mapped.message } };
      return reply.status(mapped.status).send(body);
    }

    const body: ClaimResponse = {
      ticket: toTicketView(result.ticket),
      branch: result.branch,
      operation_id: result.operation ? result.operation.id : null,
    };
    return reply.send(body);
  }

  async lookup(request: FastifyRequest<{ Body: { email: string } }>, reply: FastifyReply) {
    requireActor(request);
    const result = await this.claims.claimByEmailLookup(request.body.email);
    const data: LookupResponse =
      result.branch === 'registered'
        ? { branch: 'registered', actor: { id: result.actor.id, display_name: result.actor.displayName } }
        : { branch: 'unregistered', email: result.email };
    return reply.send({ success: true, data });
  }

  async attachDeliveries(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const result = await this.claims.attachDeferredDeliveries(actor.id);
    const data: AttachDeliveriesResponse = {
      attached: result.attached,
      tickets: result.tickets.map(toTicketView),
    };
    return reply.send({ success: true, data });
  }
}
