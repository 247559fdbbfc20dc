import Joi from 'joi';

export interface HandoffEnv {
  NODE_ENV: 'development' | 'test' | 'staging' | 'production';
  HOST: string;
  PORT: number;
  SERVICE_NAME: string;

  DB_HOST: string;
  DB_PORT: number;
  DB_USER: string;
  DB_PASSWORD: string;
  DB_NAME: string;
  DB_POOL_MIN: number;
  DB_POOL_MAX: number;

  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  REDIS_DB: number;

  JWT_SECRET: string;
  JWT_ISSUER: string;
  JWT_AUDIENCE: string;

  LOG_LEVEL: string;

  CORS_ORIGIN: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;

  TRANSFER_TOKEN_TTL_SECONDS: number;
  OPERATION_TTL_SECONDS: number;
  MAX_TTL_SECONDS: number;
  EXPIRY_SWEEP_CRON: string;
  EXPIRY_SWEEP_BATCH_SIZE: number;
  IDEMPOTENCY_TTL_SECONDS: number;
  REALTIME_HEARTBEAT_MS: number;
}

// Connection settings are mandatory outside local development and tests
const requiredInDeployment = <T extends Joi.AnySchema>(schema: T, fallback: string | number): T =>
  schema.when('NODE_ENV', {
    is: Joi.string().valid('production', 'staging'),
    then: Joi.required(),
    otherwise: Joi.optional().default(fallback),
  });

export const envSchema = Joi.object<HandoffEnv>({
  NODE_ENV: Joi.string().valid('development', 'test', 'staging', 'production').default('development'),
  HOST: Joi.string().default('0.0.0.0'),
  PORT: Joi.number().port().default(3020),
  SERVICE_NAME: Joi.string().default('handoff-service'),

  DB_HOST: requiredInDeployment(Joi.string(), 'localhost'),
  DB_PORT: Joi.number().port().default(5432),
  DB_USER: requiredInDeployment(Joi.string(), 'postgres'),
  DB_PASSWORD: requiredInDeployment(Joi.string().allow(''), 'postgres'),
  DB_NAME: requiredInDeployment(Joi.string(), 'handoff'),
  DB_POOL_MIN: Joi.number().min(0).default(2),
  DB_POOL_MAX: Joi.number().min(1).default(10),

  REDIS_HOST: requiredInDeployment(Joi.string(), 'localhost'),
  REDIS_PORT: Joi.number().port().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').optional(),
  REDIS_DB: Joi.number().min(0).default(0),

  JWT_SECRET: Joi.string().min(32).required(),
  JWT_ISSUER: Joi.string().default('handoff'),
  JWT_AUDIENCE: Joi.string().default('handoff-relay'),

  LOG_LEVEL: Joi.string().valid('trace', 'debug', 'info', 'warn', 'error', 'silent').default('info'),

  CORS_ORIGIN: Joi.string().default('*'),
  RATE_LIMIT_WINDOW_MS: Joi.number().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().positive().default(100),

  TRANSFER_TOKEN_TTL_SECONDS: Joi.number().integer().min(1).default(300),
  OPERATION_TTL_SECONDS: Joi.number().integer().min(1).default(300),
  MAX_TTL_SECONDS: Joi.number().integer().min(1).default(3600),
  EXPIRY_SWEEP_CRON: Joi.string().default('* * * * *'),
  EXPIRY_SWEEP_BATCH_SIZE: Joi.number().integer().min(1).default(100),
  IDEMPOTENCY_TTL_SECONDS: Joi.number().integer().min(1).default(86400),
  REALTIME_HEARTBEAT_MS: Joi.number().integer().min(1000).default(30000),
}).unknown(true);

/**
 * Validates the environment, listing every violation at once.
 */
export function validateEnv(env: NodeJS.ProcessEnv): HandoffEnv {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    stripUnknown: false,
  });

  if (error) {
    const errors = error.details.map((detail) => detail.message).join('; ');
    throw new Error(`Environment validation failed: ${errors}`);
  }

  return value;
}
