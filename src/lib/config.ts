/**
 * Application Configuration
 * Parses process.env into a typed AppConfig
 */

import { z } from 'zod';

/**
 * Defaults shared by the service factories and the env schema
 */
export const SEARCH_DEFAULTS = {
  textWeight: 0.6,
  vectorWeight: 0.4,
  cacheTtlSeconds: 120,
} as const;

export const OUTBOUND_TIMEOUT_MS = 5000;

export const RATE_LIMIT_DEFAULTS = {
  requests: 100,
  windowSeconds: 60,
} as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? null : value));

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== '')
    ),

  TOKEN_SIGNING_SECRET: z.string().min(1),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  UPSTASH_REDIS_URL: optionalString,
  UPSTASH_REDIS_TOKEN: optionalString,

  OPENROUTER_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),

  SEARCH_TEXT_WEIGHT: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(SEARCH_DEFAULTS.textWeight),
  SEARCH_VECTOR_WEIGHT: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(SEARCH_DEFAULTS.vectorWeight),
  SEARCH_CACHE_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(SEARCH_DEFAULTS.cacheTtlSeconds),
  OUTBOUND_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(OUTBOUND_TIMEOUT_MS),

  RATE_LIMIT_REQUESTS: z.coerce
    .number()
    .int()
    .positive()
    .default(RATE_LIMIT_DEFAULTS.requests),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(RATE_LIMIT_DEFAULTS.windowSeconds),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: string;
  allowedOrigins: string[];
  tokens: {
    signingSecret: string;
  };
  supabase: {
    url: string;
    serviceKey: string;
  };
  redis: {
    url: string;
    token: string;
  } | null;
  embeddings: {
    apiKey: string | null;
    model: string;
  };
  search: {
    textWeight: number;
    vectorWeight: number;
    cacheTtlSeconds: number;
  };
  outboundTimeoutMs: number;
  rateLimit: {
    requests: number;
    windowSeconds: number;
  };
}

/**
 * Parse an environment object into AppConfig
 * Throws with every offending key listed when the environment is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  const redis =
    values.UPSTASH_REDIS_URL !== null && values.UPSTASH_REDIS_TOKEN !== null
      ? { url: values.UPSTASH_REDIS_URL, token: values.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    env: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    allowedOrigins: values.ALLOWED_ORIGINS,
    tokens: {
      signingSecret: values.TOKEN_SIGNING_SECRET,
    },
    supabase: {
      url: values.SUPABASE_URL,
      serviceKey: values.SUPABASE_SERVICE_KEY,
    },
    redis,
    embeddings: {
      apiKey: values.OPENROUTER_API_KEY,
      model: values.EMBEDDING_MODEL,
    },
    search: {
      textWeight: values.SEARCH_TEXT_WEIGHT,
      vectorWeight: values.SEARCH_VECTOR_WEIGHT,
      cacheTtlSeconds: values.SEARCH_CACHE_TTL_SECONDS,
    },
    outboundTimeoutMs: values.OUTBOUND_TIMEOUT_MS,
    rateLimit: {
      requests: values.RATE_LIMIT_REQUESTS,
      windowSeconds: values.RATE_LIMIT_WINDOW_SECONDS,
    },
  };
}
