/**
 * Domain-specific error types for the handoff relay.
 * Expected protocol outcomes are result unions; these cover requests the
 * controllers reject and infrastructure failures.
 */

export class DomainError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 400,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class OperationNotFoundError extends DomainError {
  constructor(operationId: string) {
    super(`Operation ${operationId} not found`, 'OPERATION_NOT_FOUND', 404);
  }
}

export class ActorNotFoundError extends DomainError {
  constructor(actorId: string) {
    super(`Actor ${actorId} not found`, 'ACTOR_NOT_FOUND', 404);
  }
}

export class UnauthenticatedError extends DomainError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHENTICATED', 401);
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super(`Invalid operation state transition from ${from} to ${to}`, 'INVALID_STATE_TRANSITION', 409, {
      from,
      to,
    });
  }
}

export class TtlOutOfRangeError extends DomainError {
  constructor(ttlSeconds: number, max: number) {
    super(`ttl_seconds must be between 1 and ${max}, got ${ttlSeconds}`, 'TTL_OUT_OF_RANGE', 400);
  }
}

export class ConcurrentModificationError extends DomainError {
  constructor(operationId?: string) {
    super(
      operationId ? `Operation ${operationId} was modified concurrently` : 'Ledger rows were modified concurrently',
      'CONCURRENT_MODIFICATION',
      409
    );
  }
}
