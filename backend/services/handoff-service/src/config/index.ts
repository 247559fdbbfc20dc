import dotenv from 'dotenv';
import { HandoffEnv, validateEnv } from './env-validation';

dotenv.config();

export interface HandoffConfig {
  environment: HandoffEnv['NODE_ENV'];
  service: {
    name: string;
    host: string;
    port: number;
  };
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    pool: { min: number; max: number };
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
  auth: {
    jwtSecret: string;
    issuer: string;
    audience: string;
  };
  http: {
    corsOrigin: string;
    rateLimit: { windowMs: number; max: number };
  };
  handoff: {
    transferTokenTtlSeconds: number;
    operationTtlSeconds: number;
    maxTtlSeconds: number;
    idempotencyTtlSeconds: number;
    realtimeHeartbeatMs: number;
  };
  jobs: {
    expirySweepCron: string;
    expirySweepBatchSize: number;
  };
  logging: {
    level: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HandoffConfig {
  const vars = validateEnv(env);
  return {
    environment: vars.NODE_ENV,
    service: { name: vars.SERVICE_NAME, host: vars.HOST, port: vars.PORT },
    database: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      database: vars.DB_NAME,
      pool: { min: vars.DB_POOL_MIN, max: vars.DB_POOL_MAX },
    },
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD || undefined,
      db: vars.REDIS_DB,
    },
    auth: { jwtSecret: vars.JWT_SECRET, issuer: vars.JWT_ISSUER, audience: vars.JWT_AUDIENCE },
    http: {
      corsOrigin: vars.CORS_ORIGIN,
      rateLimit: { windowMs: vars.RATE_LIMIT_WINDOW_MS, max: vars.RATE_LIMIT_MAX_REQUESTS },
    },
    handoff: {
      transferTokenTtlSeconds: vars.TRANSFER_TOKEN_TTL_SECONDS,
      operationTtlSeconds: vars.OPERATION_TTL_SECONDS,
      maxTtlSeconds: vars.MAX_TTL_SECONDS,
      idempotencyTtlSeconds: vars.IDEMPOTENCY_TTL_SECONDS,
      realtimeHeartbeatMs: vars.REALTIME_HEARTBEAT_MS,
    },
    jobs: {
      expirySweepCron: vars.EXPIRY_SWEEP_CRON,
      expirySweepBatchSize: vars.EXPIRY_SWEEP_BATCH_SIZE,
    },
    logging: { level: vars.LOG_LEVEL },
  };
}
