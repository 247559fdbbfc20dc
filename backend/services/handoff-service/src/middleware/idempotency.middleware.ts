import type Redis from 'ioredis';
import { FastifyReply, FastifyRequest } from 'fastify';
import { validate as isUUID } from 'uuid';
import { logger } from '../utils/logger';
import { isRecord } from '../utils/status-message';

declare module 'fastify' {
  interface FastifyRequest {
    idempotencyRedisKey: string | null;
  }
}

/**
 * Key-value storage for idempotent responses.
 */
export interface IdempotencyStore {
  get(key: string): Promise<string | null>;
  /** Sets the key only if it does not exist; false when it already did. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export class RedisIdempotencyStore implements IdempotencyStore {
  constructor(private readonly redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.redis.set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

interface CachedResponse {
  statusCode: number;
  body: string;
}

const IN_PROGRESS = 102;
const ERROR_TTL_SECONDS = 3600;
const IN_PROGRESS_TTL_SECONDS = 60;

function parseCached(raw: string): CachedResponse | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) return null;
    const { statusCode, body } = parsed;
    if (typeof statusCode !== 'number' || typeof body !== 'string') return null;
    return { statusCode, body };
  } catch {
    return null;
  }
}

export interface IdempotencyOptions {
  store: IdempotencyStore;
  ttlSeconds: number;
}

/**
 * Replays the stored response for a repeated Idempotency-Key from the same
 * actor. The key is optional; requests without one always execute.
 */
export function idempotencyMiddleware(options: IdempotencyOptions) {
  const { store } = options;

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const header = request.headers['idempotency-key'];
    const idempotencyKey = Array.isArray(header) ? header[0] : header;
    if (!idempotencyKey) {
      return;
    }

    if (!isUUID(idempotencyKey)) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'IDEMPOTENCY_KEY_INVALID',
          message: 'Idempotency-Key must be a valid UUID',
        },
      });
    }

    const actorId = request.actor?.id;
    if (!actorId) {
      return reply.status(401).send({
        success: false,
        error: { code: 'UNAUTHENTICATED', message: 'Authentication required' },
      });
    }

    const redisKey = `idempotency:${request.method}:${request.url}:${actorId}:${idempotencyKey}`;

    try {
      const marker = JSON.stringify({ statusCode: IN_PROGRESS, body: '' });
      const claimed = await store.setIfAbsent(redisKey, marker, IN_PROGRESS_TTL_SECONDS);
      if (claimed) {
        request.idempotencyRedisKey = redisKey;
        return;
      }

      const raw = await store.get(redisKey);
      const cached = raw === null ? null : parseCached(raw);
      if (!cached || cached.statusCode === IN_PROGRESS) {
        logger.warn({ actorId, path: request.url }, 'Concurrent duplicate request detected');
        return reply.status(409).send({
          success: false,
          error: {
            code: 'DUPLICATE_IN_PROGRESS',
            message: 'A request with this idempotency key is currently being processed',
          },
        });
      }

      logger.info({ actorId, originalStatus: cached.statusCode }, 'Returning cached idempotent response');
      return reply
        .status(cached.statusCode)
        .header('content-type', 'application/json; charset=utf-8')
        .header('idempotent-replayed', 'true')
        .send(cached.body);
    } catch (err) {
      // degraded mode: the request runs without replay protection
      logger.error({ err, actorId }, 'Idempotency middleware error');
      return;
    }
  };
}

/**
 * onSend hook: keeps 2xx responses for the configured window and 4xx for an
 * hour, and forgets the key after a 5xx so the client may retry.
 */
export function idempotencyCacheHook(options: IdempotencyOptions) {
  const { store, ttlSeconds } = options;

  return async (request: FastifyRequest, reply: FastifyReply, payload: unknown) => {
    const redisKey = request.idempotencyRedisKey;
    if (!redisKey) {
      return payload;
    }

    const statusCode = reply.statusCode;
    const body = typeof payload === 'string' ? payload : JSON.stringify(payload ?? null);

    try {
      if (statusCode >= 500) {
        await store.del(redisKey);
      } else {
        const ttl = statusCode < 400 ? ttlSeconds : ERROR_TTL_SECONDS;
        await store.set(redisKey, JSON.stringify({ statusCode, body }), ttl);
      }
    } catch (err) {
      logger.error({ err, statusCode }, 'Failed to record idempotent response');
    }

    return payload;
  };
}
