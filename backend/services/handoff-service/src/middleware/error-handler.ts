import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { DomainError } from '../errors/domain-errors';
import { logger } from '../utils/logger';

const log = logger.child({ component: 'ErrorHandler' });

export const errorHandler = (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
  if (error instanceof DomainError) {
    if (error.statusCode >= 500) {
      log.error({ err: error, method: request.method, url: request.url }, 'Request failed');
    }
    return reply.status(error.statusCode).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
  }

  if ('validation' in error && error.validation) {
    return reply.status(400).send({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: error.message,
        details: error.validation,
      },
    });
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 500) {
    log.error({ err: error, method: request.method, url: request.url }, 'Unhandled request error');
    return reply.status(500).send({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  }

  return reply.status(statusCode).send({
    success: false,
    error: {
      code: 'code' in error && typeof error.code === 'string' ? error.code : 'REQUEST_ERROR',
      message: error.message,
    },
  });
};
