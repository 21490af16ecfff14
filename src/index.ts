import dotenv from 'dotenv';
import { loadConfig } from './lib/config.js';
import { createLogger, setLogLevel } from './lib/logger.js';
import { createMemoryCacheStore, type CacheStore } from './lib/cache.js';
import { createRedisCacheStore } from './lib/redis-cache.js';
import {
  createGenerationAdapter,
  createOpenAIProjectGenerator,
  createProjectOrchestrator,
  createUnconfiguredGenerator,
  getTemplateProvider,
  type ProjectGenerator,
} from './core/index.js';
import { createRateLimiter, toRateLimitConfig } from './middleware/rateLimit.js';
import { createApiServer } from './api/index.js';
import type { AppConfig } from './types/index.js';

dotenv.config();

const log = createLogger('main');

async function createStore(config: AppConfig): Promise<{ store: CacheStore; close: () => Promise<void> }> {
  if (config.redis) {
    const redis = createRedisCacheStore(config.redis);
    await redis.connect();
    return { store: redis, close: () => redis.close() };
  }

  log.warn('REDIS_URL not set, using in-process memory store');
  const memory = createMemoryCacheStore();
  const timer = memory.startAutoCleanup();
  return {
    store: memory,
    close: async () => clearInterval(timer),
  };
}

function createGenerator(config: AppConfig): ProjectGenerator {
  if (config.ai.apiKey) {
    return createOpenAIProjectGenerator(config.ai);
  }
  log.warn('AI_API_KEY not set, serving template projects only');
  return createUnconfiguredGenerator();
}

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting daily projects engine', { model: config.ai.model, redis: Boolean(config.redis) });

  const { store, close } = await createStore(config);
  const templates = getTemplateProvider();
  const adapter = createGenerationAdapter(createGenerator(config), templates, {
    timeoutMs: config.ai.timeoutMs,
    retryBackoffMs: config.ai.retryBackoffMs,
  });
  const rateLimiter = createRateLimiter({ store, config: toRateLimitConfig(config.rateLimit) });

  const orchestrator = createProjectOrchestrator({
    store,
    adapter,
    templates,
    rateLimiter,
    policy: config.cache,
  });

  const api = createApiServer({ orchestrator, maxBodySize: config.server.maxBodySize });
  await api.start(config.server.port, config.server.host);

  // Handle shutdown
  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    api.stop()
      .then(close)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  log.error('Failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
