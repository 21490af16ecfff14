/**
 * Configuration
 * Reads engine settings from the environment
 */

import { z } from 'zod';
import { LogLevelEnum, type AppConfig } from '../types/index.js';
import { ValidationError } from './errors.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: positiveInt(8000),
  HOST: z.string().default('0.0.0.0'),
  MAX_BODY_SIZE: positiveInt(1048576),

  REDIS_URL: z.string().url().optional(),
  CACHE_OP_TIMEOUT_MS: positiveInt(2000),

  AI_API_KEY: z.string().min(1).optional(),
  AI_BASE_URL: z.string().url().default('https://api.deepseek.com/v1'),
  AI_MODEL: z.string().min(1).default('deepseek-chat'),
  AI_MAX_TOKENS: positiveInt(2000),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.8),
  GENERATION_TIMEOUT_MS: positiveInt(30000),
  GENERATION_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),

  DAILY_PROJECTS_TTL: positiveInt(86400 * 7),
  FALLBACK_PROJECTS_TTL: positiveInt(3600),
  GENERATION_LOCK_TTL: positiveInt(90),
  POLL_INTERVAL_MS: positiveInt(500),

  RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),
  RATE_LIMIT_MAX_REQUESTS: positiveInt(60),
  RATE_LIMIT_DISABLED: booleanFlag,
  RATE_LIMIT_BYPASS_KEYS: z.string().default(''),

  LOG_LEVEL: LogLevelEnum.default('info'),
});

type Env = Record<string, string | undefined>;

/**
 * Empty strings count as unset so that `FOO=` in a .env file falls back to the
 * default.
 */
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid configuration for ${field}: ${issue.message}`, field);
  }

  const values = parsed.data;

  if (values.FALLBACK_PROJECTS_TTL > values.DAILY_PROJECTS_TTL) {
    throw new ValidationError(
      'Invalid configuration for FALLBACK_PROJECTS_TTL: must not exceed DAILY_PROJECTS_TTL',
      'FALLBACK_PROJECTS_TTL'
    );
  }

  // A lock that expires mid-generation lets a waiter start a second AI call
  const generationBudgetMs = 2 * values.GENERATION_TIMEOUT_MS + values.GENERATION_RETRY_BACKOFF_MS;
  if (values.GENERATION_LOCK_TTL * 1000 <= generationBudgetMs) {
    throw new ValidationError(
      `Invalid configuration for GENERATION_LOCK_TTL: must exceed ${generationBudgetMs}ms, the longest a generation with one retry can take`,
      'GENERATION_LOCK_TTL'
    );
  }

  return {
    server: {
      port: values.PORT,
      host: values.HOST,
      maxBodySize: values.MAX_BODY_SIZE,
    },
    redis: values.REDIS_URL
      ? { url: values.REDIS_URL, opTimeoutMs: values.CACHE_OP_TIMEOUT_MS }
      : undefined,
    ai: {
      apiKey: values.AI_API_KEY,
      baseUrl: values.AI_BASE_URL,
      model: values.AI_MODEL,
      maxTokens: values.AI_MAX_TOKENS,
      temperature: values.AI_TEMPERATURE,
      timeoutMs: values.GENERATION_TIMEOUT_MS,
      retryBackoffMs: values.GENERATION_RETRY_BACKOFF_MS,
    },
    cache: {
      dailyTtlSeconds: values.DAILY_PROJECTS_TTL,
      fallbackTtlSeconds: values.FALLBACK_PROJECTS_TTL,
      lockTtlSeconds: values.GENERATION_LOCK_TTL,
      pollIntervalMs: values.POLL_INTERVAL_MS,
    },
    rateLimit: {
      windowSeconds: values.RATE_LIMIT_WINDOW_SECONDS,
      maxRequests: values.RATE_LIMIT_MAX_REQUESTS,
      disabled: values.RATE_LIMIT_DISABLED,
      bypassKeys: values.RATE_LIMIT_BYPASS_KEYS.split(',').map((key) => key.trim()).filter(Boolean),
    },
    logLevel: values.LOG_LEVEL,
  };
}
