import { FastifyReply, FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import type { HandoffConfig } from '../config';
import { AuthenticatedActor } from '../types/handoff.types';
import { UnauthenticatedError } from '../errors/domain-errors';

declare module 'fastify' {
  interface FastifyRequest {
    actor: AuthenticatedActor | null;
  }
}

/**
 * Verifies a bearer access token. The subject is the actor id; the email
 * claim is optional.
 */
export function verifyAccessToken(token: string, auth: HandoffConfig['auth']): AuthenticatedActor | null {
  try {
    const decoded = jwt.verify(token, auth.jwtSecret, {
      algorithms: ['HS256'],
      issuer: auth.issuer,
      audience: auth.audience,
    });
    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || decoded.sub.length === 0) {
      return null;
    }
    const email: unknown = decoded.email;
    return { id: decoded.sub, email: typeof email === 'string' ? email : null };
  } catch {
    return null;
  }
}

export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

export function createAuthMiddleware(auth: HandoffConfig['auth']) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const token = bearerToken(request.headers.authorization);
    if (!token) {
      return reply.status(401).send({
        success: false,
        error: { code: 'UNAUTHENTICATED', message: 'Authentication required' },
      });
    }

    const actor = verifyAccessToken(token, auth);
    if (!actor) {
      return reply.status(401).send({
        success: false,
        error: { code: 'INVALID_TOKEN', message: 'Invalid or expired access token' },
      });
    }
    request.actor = actor;
  };
}

export function requireActor(request: FastifyRequest): AuthenticatedActor {
  if (!request.actor) {
    throw new UnauthenticatedError();
  }
  return request.actor;
}
