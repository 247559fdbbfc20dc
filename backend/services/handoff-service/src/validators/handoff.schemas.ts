import Joi from 'joi';

const actorId = Joi.string().trim().min(1).max(128);
const ttlSeconds = Joi.number().integer().min(1);

export const operationIdParamsSchema = Joi.object({
  id: Joi.string().uuid().required(),
});

export const issueTokenSchema = Joi.object({
  ticket_id: Joi.string().trim().min(1).max(128).required(),
  ttl_seconds: ttlSeconds.optional(),
});

export const createOperationSchema = Joi.object({
  kind: Joi.string().valid('payment', 'transfer').required(),
  ttl_seconds: ttlSeconds.optional(),
  counterparty_actor_id: actorId.when('kind', {
    is: 'payment',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  subject_ref: Joi.string().trim().min(1).max(255).when('kind', {
    is: 'payment',
    then: Joi.required(),
    otherwise: Joi.forbidden(),
  }),
  amount_cents: Joi.number().integer().min(1).when('kind', {
    is: 'payment',
    then: Joi.required(),
    otherwise: Joi.forbidden(),
  }),
  currency: Joi.string()
    .uppercase()
    .pattern(/^[A-Z]{3}$/)
    .when('kind', {
      is: 'payment',
      then: Joi.required(),
      otherwise: Joi.forbidden(),
    }),
  ticket_id: Joi.string().trim().min(1).max(128).when('kind', {
    is: 'transfer',
    then: Joi.required(),
    otherwise: Joi.forbidden(),
  }),
});

export const attachCounterpartySchema = Joi.object({
  counterparty_actor_id: actorId.required(),
});

export const completePaymentSchema = Joi.object({
  payment_reference: Joi.string().trim().min(1).max(255).required(),
});

export const failOperationSchema = Joi.object({
  reason: Joi.string().trim().min(1).max(500).required(),
});

export const deliverSchema = Joi.object({
  email: Joi.string().trim().email().max(320).required(),
});

export const claimSchema = Joi.object({
  transfer_token: Joi.string()
    .trim()
    .pattern(/^[A-Za-z0-9_-]{16,128}$/)
    .required(),
});

export const lookupSchema = Joi.object({
  email: Joi.string().trim().email().max(320).required(),
});
