import type { IncomingMessage, ServerResponse } from 'http';
import type { RateLimitSettings } from '../types/index.js';
import { CacheKeys, type CacheStore } from '../lib/cache.js';
import { CacheUnavailableError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

/**
 * Rate Limiting
 *
 * Fixed-window counters per caller key, kept in the Cache Store so that every
 * process behind the same store shares one budget:
 * - window id = floor(now / window length)
 * - the first request of a window creates the counter with a TTL of one window
 * - fails open when the store is unreachable
 */

export interface RateLimitConfig {
  windowMs: number;           // Time window in milliseconds
  maxRequests: number;        // Maximum requests per window
  disabled?: boolean;
  bypassKeys?: string[];
}

export interface RateLimitAllowed {
  allowed: true;
  limit: number;
  windowMs: number;
  remaining: number;
  resetTime: number;
  /** Set when the store was unreachable and the request was let through */
  degraded: boolean;
}

export interface RateLimitRejected {
  allowed: false;
  limit: number;
  windowMs: number;
  remaining: 0;
  resetTime: number;
  retryAfter: number;
}

export type RateLimitDecision = RateLimitAllowed | RateLimitRejected;

export interface RateLimiterOptions {
  store: CacheStore;
  config: RateLimitConfig;
  now?: () => number;
}

const log = createLogger('rate-limit');

export function toRateLimitConfig(settings: RateLimitSettings): RateLimitConfig {
  return {
    windowMs: settings.windowSeconds * 1000,
    maxRequests: settings.maxRequests,
    disabled: settings.disabled,
    bypassKeys: settings.bypassKeys,
  };
}

export class RateLimiter {
  private store: CacheStore;
  private config: RateLimitConfig;
  private now: () => number;
  private bypassed: ReadonlySet<string>;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.config = options.config;
    this.now = options.now || Date.now;
    this.bypassed = new Set(options.config.bypassKeys || []);
  }

  async admit(callerKey: string): Promise<RateLimitDecision> {
    const now = this.now();
    const windowId = Math.floor(now / this.config.windowMs);
    const resetTime = (windowId + 1) * this.config.windowMs;
    const base = { limit: this.config.maxRequests, windowMs: this.config.windowMs, resetTime };

    if (this.config.disabled || this.bypassed.has(callerKey)) {
      return { ...base, allowed: true, remaining: this.config.maxRequests, degraded: false };
    }

    let count: number;
    try {
      count = await this.store.increment(
        CacheKeys.rateWindow(callerKey, windowId),
        Math.ceil(this.config.windowMs / 1000)
      );
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) {
        throw error;
      }
      log.warn('Rate limit store unavailable, failing open', { callerKey, error: error.message });
      return { ...base, allowed: true, remaining: this.config.maxRequests, degraded: true };
    }

    if (count > this.config.maxRequests) {
      const retryAfter = Math.max(1, Math.ceil((resetTime - now) / 1000));
      logRateLimitEvent(callerKey, false, this.config, 0);
      return { ...base, allowed: false, remaining: 0, retryAfter };
    }

    const remaining = this.config.maxRequests - count;
    logRateLimitEvent(callerKey, true, this.config, remaining);
    return { ...base, allowed: true, remaining, degraded: false };
  }
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  return new RateLimiter(options);
}

/**
 * Extract client identifier from request
 * Uses X-Forwarded-For header if behind proxy, otherwise socket address
 */
export function getClientIdentifier(req: IncomingMessage): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }

  const realIp = req.headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? realIp[0] : realIp;
  }

  const socketAddr = req.socket?.remoteAddress;
  return socketAddr || 'unknown';
}

function logRateLimitEvent(key: string, allowed: boolean, config: RateLimitConfig, remaining: number): void {
  const fields = {
    key,
    allowed,
    remaining,
    limit: config.maxRequests,
    windowMs: config.windowMs,
  };
  if (!allowed) {
    log.warn('Rate limit exceeded', fields);
  } else {
    log.debug('Rate limit check', fields);
  }
}

/**
 * Rate limiting middleware
 *
 * Returns false if rate limit exceeded (response already sent).
 */
export async function rateLimit(
  req: IncomingMessage,
  res: ServerResponse,
  admit: (callerKey: string) => Promise<RateLimitDecision>
): Promise<boolean> {
  const result = await admit(getClientIdentifier(req));

  res.setHeader('X-RateLimit-Limit', result.limit);
  res.setHeader('X-RateLimit-Remaining', result.remaining);
  res.setHeader('X-RateLimit-Reset', Math.ceil(result.resetTime / 1000));
  res.setHeader('X-RateLimit-Policy', `${result.limit};w=${Math.ceil(result.windowMs / 1000)}`);

  if (!result.allowed) {
    res.setHeader('Retry-After', result.retryAfter);
    res.writeHead(429, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({
      error: 'Too many requests',
      code: 'RATE_LIMIT_EXCEEDED',
      retryAfter: result.retryAfter,
      limit: result.limit,
      windowMs: result.windowMs,
    }));
    return false;
  }

  if (result.degraded) {
    res.setHeader('X-RateLimit-Degraded', 'true');
  }

  return true;
}
