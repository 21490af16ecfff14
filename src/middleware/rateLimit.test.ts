import { describe, it, expect, beforeEach } from 'vitest';
import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import {
  RateLimiter,
  getClientIdentifier,
  rateLimit,
  toRateLimitConfig,
  type RateLimitDecision,
} from './rateLimit.js';
import { MemoryCacheStore } from '../lib/cache.js';
import { FailingCacheStore } from '../tests/fakes.js';

// Helper to create mock request
function createMockRequest(headers: Record<string, string> = {}): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.headers = headers;
  return req;
}

// Helper to create mock response
function createMockResponse(): ServerResponse & { headers: Record<string, string | number | string[]>; statusCode: number; body: string } {
  const res = {
    headers: {} as Record<string, string | number | string[]>,
    statusCode: 200,
    body: '',
    setHeader(name: string, value: string | number | string[]) {
      this.headers[name.toLowerCase()] = value;
    },
    writeHead(statusCode: number, headers?: Record<string, string>) {
      this.statusCode = statusCode;
      if (headers) {
        for (const [key, value] of Object.entries(headers)) {
          this.headers[key.toLowerCase()] = value;
        }
      }
    },
    end(body?: string) {
      this.body = body || '';
    }
  };
  return res as unknown as ServerResponse & { headers: Record<string, string | number | string[]>; statusCode: number; body: string };
}

describe('RateLimiter', () => {
  const WINDOW_MS = 60_000;
  const MAX = 3;
  let clock: number;
  let store: MemoryCacheStore;
  let limiter: RateLimiter;

  beforeEach(() => {
    // 10s into a window
    clock = WINDOW_MS * 1000 + 10_000;
    store = new MemoryCacheStore({ now: () => clock });
    limiter = new RateLimiter({
      store,
      config: { windowMs: WINDOW_MS, maxRequests: MAX },
      now: () => clock,
    });
  });

  it('should accept up to the maximum within a window', async () => {
    const decisions: RateLimitDecision[] = [];
    for (let i = 0; i < MAX; i++) {
      decisions.push(await limiter.admit('10.0.0.1'));
    }

    expect(decisions.map((d) => d.allowed)).toEqual([true, true, true]);
    expect(decisions.map((d) => d.remaining)).toEqual([2, 1, 0]);
  });

  it('should reject the call after the maximum with the time to rollover', async () => {
    for (let i = 0; i < MAX; i++) {
      await limiter.admit('10.0.0.1');
    }

    const rejected = await limiter.admit('10.0.0.1');
    expect(rejected).toEqual({
      allowed: false,
      limit: MAX,
      windowMs: WINDOW_MS,
      remaining: 0,
      resetTime: WINDOW_MS * 1001,
      retryAfter: 50,
    });
  });

  it('should start counting again in the next window', async () => {
    for (let i = 0; i <= MAX; i++) {
      await limiter.admit('10.0.0.1');
    }

    clock += 50_000;
    const decision = await limiter.admit('10.0.0.1');
    expect(decision.allowed).toBe(true);
    expect(decision.remaining).toBe(MAX - 1);
  });

  it('should report at least one second to retry', async () => {
    for (let i = 0; i < MAX; i++) {
      await limiter.admit('10.0.0.1');
    }
    clock += 49_999;

    const rejected = await limiter.admit('10.0.0.1');
    expect(rejected.allowed).toBe(false);
    expect(rejected.allowed === false && rejected.retryAfter).toBe(1);
  });

  it('should count callers independently', async () => {
    for (let i = 0; i < MAX; i++) {
      await limiter.admit('10.0.0.1');
    }

    expect((await limiter.admit('10.0.0.2')).allowed).toBe(true);
  });

  it('should fail open when the store is unavailable', async () => {
    const failing = new RateLimiter({
      store: new FailingCacheStore(),
      config: { windowMs: WINDOW_MS, maxRequests: MAX },
      now: () => clock,
    });

    const decision = await failing.admit('10.0.0.1');
    expect(decision).toMatchObject({ allowed: true, degraded: true, remaining: MAX });
  });

  it('should never limit bypassed callers', async () => {
    const bypassing = new RateLimiter({
      store,
      config: { windowMs: WINDOW_MS, maxRequests: MAX, bypassKeys: ['internal'] },
      now: () => clock,
    });

    for (let i = 0; i < MAX + 2; i++) {
      expect((await bypassing.admit('internal')).allowed).toBe(true);
    }
    expect(await store.keys('rate:internal:*')).toEqual([]);
    expect((await bypassing.admit('10.0.0.1')).remaining).toBe(MAX - 1);
  });

  it('should admit everything when disabled', async () => {
    const disabled = new RateLimiter({
      store,
      config: toRateLimitConfig({ windowSeconds: 60, maxRequests: 1, disabled: true, bypassKeys: [] }),
      now: () => clock,
    });

    expect((await disabled.admit('a')).allowed).toBe(true);
    expect((await disabled.admit('a')).allowed).toBe(true);
  });
});

describe('getClientIdentifier', () => {
  it('should prefer the first forwarded address', () => {
    expect(getClientIdentifier(createMockRequest({ 'x-forwarded-for': '203.0.113.5, 10.0.0.1' }))).toBe('203.0.113.5');
  });

  it('should fall back to X-Real-IP', () => {
    expect(getClientIdentifier(createMockRequest({ 'x-real-ip': '198.51.100.7' }))).toBe('198.51.100.7');
  });

  it('should return unknown without any address', () => {
    expect(getClientIdentifier(createMockRequest())).toBe('unknown');
  });
});

describe('rateLimit middleware', () => {
  const allowed: RateLimitDecision = {
    allowed: true,
    limit: 60,
    windowMs: 60_000,
    remaining: 59,
    resetTime: 120_000,
    degraded: false,
  };

  it('should set rate limit headers and continue', async () => {
    const res = createMockResponse();
    const result = await rateLimit(createMockRequest(), res, async () => allowed);

    expect(result).toBe(true);
    expect(res.headers['x-ratelimit-limit']).toBe(60);
    expect(res.headers['x-ratelimit-remaining']).toBe(59);
    expect(res.headers['x-ratelimit-reset']).toBe(120);
    expect(res.headers['x-ratelimit-policy']).toBe('60;w=60');
    expect(res.headers['x-ratelimit-degraded']).toBeUndefined();
  });

  it('should pass the client identifier to admit', async () => {
    const seen: string[] = [];
    await rateLimit(createMockRequest({ 'x-forwarded-for': '203.0.113.5' }), createMockResponse(), async (key) => {
      seen.push(key);
      return allowed;
    });

    expect(seen).toEqual(['203.0.113.5']);
  });

  it('should answer 429 when rejected', async () => {
    const res = createMockResponse();
    const result = await rateLimit(createMockRequest(), res, async () => ({
      allowed: false,
      limit: 60,
      windowMs: 60_000,
      remaining: 0,
      resetTime: 120_000,
      retryAfter: 42,
    }));

    expect(result).toBe(false);
    expect(res.statusCode).toBe(429);
    expect(res.headers['retry-after']).toBe(42);
    expect(JSON.parse(res.body)).toEqual({
      error: 'Too many requests',
      code: 'RATE_LIMIT_EXCEEDED',
      retryAfter: 42,
      limit: 60,
      windowMs: 60_000,
    });
  });

  it('should flag degraded admissions', async () => {
    const res = createMockResponse();
    await rateLimit(createMockRequest(), res, async () => ({ ...allowed, degraded: true }));
    expect(res.headers['x-ratelimit-degraded']).toBe('true');
  });
});
