import { createClient } from 'redis';
import type { RedisConfig } from '../types/index.js';
import { CacheUnavailableError } from './errors.js';
import { createLogger } from './logger.js';
import { isPattern, type CacheStore } from './cache.js';

type RedisClient = ReturnType<typeof createClient>;

const log = createLogger('redis-cache');

// INCR and EXPIRE in one step so the TTL is only set by the call that creates the key
const INCREMENT_WITH_TTL = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

const DELETE_IF_EQUALS = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const SCAN_BATCH = 100;

export class RedisCacheStore implements CacheStore {
  private client: RedisClient;
  private opTimeoutMs: number;

  constructor(config: RedisConfig) {
    this.opTimeoutMs = config.opTimeoutMs;
    this.client = createClient({
      url: config.url,
      // Commands fail immediately while disconnected instead of queueing
      disableOfflineQueue: true,
      socket: {
        connectTimeout: config.opTimeoutMs,
        reconnectStrategy: (retries) => Math.min(retries * 100, 3000),
      },
    });

    this.client.on('error', (err: unknown) => {
      log.warn('Redis client error', { error: err instanceof Error ? err.message : String(err) });
    });
    this.client.on('ready', () => {
      log.info('Redis connection ready');
    });
  }

  async connect(): Promise<void> {
    try {
      await this.run('connect', () => this.client.connect().then(() => undefined));
    } catch (error) {
      log.warn('Redis unavailable at start-up, continuing without cache', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('set', () => this.client.set(key, value, { EX: ttlSeconds }));
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const reply = await this.run('setIfAbsent', () =>
      this.client.set(key, value, { EX: ttlSeconds, NX: true })
    );
    return reply === 'OK';
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const reply = await this.run('deleteIfEquals', () =>
      this.client.eval(DELETE_IF_EQUALS, { keys: [key], arguments: [value] })
    );
    return reply === 1;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const reply = await this.run('increment', () =>
      this.client.eval(INCREMENT_WITH_TTL, { keys: [key], arguments: [String(ttlSeconds)] })
    );
    if (typeof reply !== 'number') {
      throw new CacheUnavailableError('increment', new Error(`Unexpected reply: ${String(reply)}`));
    }
    return reply;
  }

  async delete(keyOrPattern: string): Promise<number> {
    const keys = isPattern(keyOrPattern) ? await this.keys(keyOrPattern) : [keyOrPattern];
    if (keys.length === 0) {
      return 0;
    }
    return this.run('delete', () => this.client.del(keys));
  }

  keys(pattern: string): Promise<string[]> {
    return this.run('keys', async () => {
      const found: string[] = [];
      for await (const key of this.client.scanIterator({ MATCH: pattern, COUNT: SCAN_BATCH })) {
        found.push(key);
      }
      return found;
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.client.ping());
  }

  /**
   * Runs a command under the per-operation timeout and maps every failure to
   * CacheUnavailableError.
   */
  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    if (operation !== 'connect' && !this.client.isReady) {
      throw new CacheUnavailableError(operation, new Error('client not connected'));
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new CacheUnavailableError(operation, new Error(`timed out after ${this.opTimeoutMs}ms`))),
        this.opTimeoutMs
      );
    });

    try {
      return await Promise.race([command(), timeout]);
    } catch (error) {
      if (error instanceof CacheUnavailableError) {
        throw error;
      }
      throw new CacheUnavailableError(operation, error);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createRedisCacheStore(config: RedisConfig): RedisCacheStore {
  return new RedisCacheStore(config);
}
