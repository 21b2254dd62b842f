import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  BACKEND_URL: z.string({ required_error: 'BACKEND_URL is required' }).url(),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  REDIS_URL: z.string().url().optional(),
  RATE_LIMIT_IDLE_TTL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  API_KEY_PREFIX: z.string().regex(/^[A-Za-z0-9_-]+$/).default('gw'),
  MAX_ISSUED_KEYS: z.coerce.number().int().min(0).default(1000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  COLLECT_DEFAULT_METRICS: booleanString.default('true'),
})

export interface GatewayConfig {
  env: 'development' | 'production' | 'test'
  host: string
  port: number
  backend: {
    url: string
    timeoutMs: number
  }
  rateLimit: {
    redisUrl?: string
    idleTtlMs: number
    sweepIntervalMs: number
  }
  apiKeyPrefix: string
  maxIssuedKeys: number
  corsOrigin: string
  collectDefaultMetrics: boolean
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Reads the gateway configuration from the environment. Called once at
 * startup; there is no reload.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const vars = parsed.data
  return {
    env: vars.NODE_ENV,
    host: vars.HOST,
    port: vars.PORT,
    backend: {
      url: vars.BACKEND_URL,
      timeoutMs: vars.BACKEND_TIMEOUT_MS,
    },
    rateLimit: {
      redisUrl: vars.REDIS_URL,
      idleTtlMs: vars.RATE_LIMIT_IDLE_TTL_MS,
      sweepIntervalMs: vars.RATE_LIMIT_SWEEP_INTERVAL_MS,
    },
    apiKeyPrefix: vars.API_KEY_PREFIX,
    maxIssuedKeys: vars.MAX_ISSUED_KEYS,
    corsOrigin: vars.CORS_ORIGIN,
    collectDefaultMetrics: vars.COLLECT_DEFAULT_METRICS,
  }
}
