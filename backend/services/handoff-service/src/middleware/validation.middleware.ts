import { FastifyReply, FastifyRequest } from 'fastify';
import Joi from 'joi';

function validationFailure(reply: FastifyReply, error: Joi.ValidationError, message: string) {
  const details = error.details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message,
  }));

  return reply.status(400).send({
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message,
      details,
    },
  });
}

export const validate = (schema: Joi.ObjectSchema) => {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const { error, value } = schema.validate(request.body ?? {}, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return validationFailure(reply, error, 'Validation failed');
    }

    request.body = value;
  };
};

export const validateParams = (schema: Joi.ObjectSchema) => {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const { error, value } = schema.validate(request.params, {
      abortEarly: false,
    });

    if (error) {
      return validationFailure(reply, error, 'Invalid path parameters');
    }

    request.params = value;
  };
};
