import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_PROJECT_COUNT,
  DailyBatchSchema,
  GenerationRequestSchema,
  MAX_PROJECT_COUNT,
  type ArchiveEntry,
  type CachePolicyConfig,
  type DailyBatch,
  type DailyRequest,
  type GenerationRequest,
  type GenerationRequestInput,
  type HealthReport,
  type Project,
  type ProjectSource,
  type StatsSnapshot,
} from '../../types/index.js';
import { CacheKeys, type CacheStore, type StatCounter } from '../../lib/cache.js';
import {
  CacheUnavailableError,
  GenerationUnavailableError,
  NotFoundError,
  ValidationError,
} from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { RateLimitDecision, RateLimiter } from '../../middleware/rateLimit.js';
import type { GeneratedProject, GenerationAdapter } from '../generation/index.js';
import type { TemplateConstraints, TemplateProvider } from '../templates/index.js';

export type OrchestratorState = 'idle' | 'generating' | 'waiting' | 'served';

export interface StateTransition {
  key: string;
  from: OrchestratorState;
  to: OrchestratorState;
  reason: string;
}

export interface OrchestratorOptions {
  store: CacheStore;
  adapter: GenerationAdapter;
  templates: TemplateProvider;
  rateLimiter: RateLimiter;
  policy: CachePolicyConfig;
  now?: () => Date;
}

export interface CustomGeneration {
  projects: Project[];
  /** Padded from templates, or template preferences had to be widened */
  degraded: boolean;
}

interface ProducedBatch {
  batch: DailyBatch;
  ttlSeconds: number;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const PROJECT_ID_PATTERN = /^(\d{4}-\d{2}-\d{2})-(\d+)$/;
const STATS_TTL_SECONDS = 86400 * 7;
const MAX_ARCHIVE_DAYS = 30;
const ARCHIVE_PREVIEW = 3;

const STAT_COUNTERS: StatCounter[] = [
  'total_generated',
  'ai_sourced',
  'fallback_sourced',
  'cache_hits',
  'cache_misses',
];

const log = createLogger('orchestrator');

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYYMMDDHHmmss in UTC
 */
function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

export function validateDate(date: string): string {
  const parsed = new Date(`${date}T00:00:00Z`);
  if (!DATE_PATTERN.test(date) || Number.isNaN(parsed.getTime()) || formatDate(parsed) !== date) {
    throw new ValidationError('date must be a calendar date in YYYY-MM-DD format', 'date');
  }
  return date;
}

export function validateCount(count: number): number {
  if (!Number.isInteger(count) || count < 1 || count > MAX_PROJECT_COUNT) {
    throw new ValidationError(`count must be an integer between 1 and ${MAX_PROJECT_COUNT}`, 'count');
  }
  return count;
}

export function validateGenerationRequest(input: unknown): GenerationRequest {
  const parsed = GenerationRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`${field}: ${issue.message}`, field);
  }
  return parsed.data;
}

/**
 * Project Orchestrator
 *
 * Facade of the engine. Each daily request walks a small state machine keyed
 * by `(date, count)`:
 *
 *   idle -> served                    cached batch
 *   idle -> generating -> served      lock holder publishes AI or template batch
 *   idle -> waiting -> served         another holder published while we polled
 *   waiting -> generating -> served   holder vanished, lock taken over
 *
 * All coordination goes through the CacheStore (set-if-absent lock, atomic
 * counters); the orchestrator keeps no per-request state of its own.
 */
export class ProjectOrchestrator extends EventEmitter {
  private store: CacheStore;
  private adapter: GenerationAdapter;
  private templates: TemplateProvider;
  private rateLimiter: RateLimiter;
  private policy: CachePolicyConfig;
  private lockTtlSeconds: number;
  private now: () => Date;

  constructor(options: OrchestratorOptions) {
    super();
    this.store = options.store;
    this.adapter = options.adapter;
    this.templates = options.templates;
    this.rateLimiter = options.rateLimiter;
    this.policy = options.policy;
    this.lockTtlSeconds = lockTtlFor(options.policy, options.adapter);
    this.now = options.now || (() => new Date());
  }

  /**
   * Admit or reject a caller before any other operation.
   */
  admitRequest(callerKey: string): Promise<RateLimitDecision> {
    return this.rateLimiter.admit(callerKey);
  }

  async getDaily(request: DailyRequest = {}): Promise<DailyBatch> {
    const date = validateDate(request.date ?? formatDate(this.now()));
    const count = validateCount(request.count ?? DEFAULT_PROJECT_COUNT);
    const key = CacheKeys.daily(date, count);

    let cached: DailyBatch | null;
    try {
      cached = await this.readBatch(key);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Cache unavailable, generating without cache', { key, error: error.message });
      return this.produceUncached(key, date, count);
    }

    if (cached && !request.forceRegenerate) {
      await this.bump('cache_hits');
      this.transition(key, 'idle', 'served', 'cache_hit');
      return cached;
    }

    await this.bump('cache_misses');
    return this.generateWithLock(key, date, count, cached, request.signal);
  }

  /**
   * Custom batches never touch the daily cache, so `forceRegenerate` has no
   * effect here.
   */
  async generateCustom(input: GenerationRequestInput): Promise<CustomGeneration> {
    const request = validateGenerationRequest(input);
    const createdAt = this.now();
    const stamp = compactTimestamp(createdAt);
    const constraints: TemplateConstraints = {
      difficultyPreference: request.difficultyPreference,
      categoryPreference: request.categoryPreference,
    };

    let generated: GeneratedProject[];
    let source: ProjectSource;
    let degraded: boolean;
    try {
      const result = await this.adapter.generate({ count: request.count, ...constraints, seed: `custom:${stamp}` });
      generated = result.projects;
      source = 'ai';
      degraded = result.degraded || result.widened;
    } catch (error) {
      if (!(error instanceof GenerationUnavailableError)) throw error;
      log.warn('Custom generation unavailable, using templates', { reason: error.reason });
      const sample = this.templates.sample(request.count, constraints, `custom:${stamp}`);
      generated = sample.projects.map((draft): GeneratedProject => ({ draft, source: 'fallback' }));
      source = 'fallback';
      degraded = sample.widened;
    }

    await this.recordGenerated(source);
    if (degraded) {
      log.warn('Serving degraded custom batch', {
        count: request.count,
        difficultyPreference: request.difficultyPreference,
        categoryPreference: request.categoryPreference,
      });
    }

    const generatedAt = createdAt.toISOString();
    return {
      projects: generated.map(({ draft, source: projectSource }, index) => ({
        ...draft,
        id: `custom-${stamp}-${index + 1}`,
        source: projectSource,
        generatedAt,
      })),
      degraded,
    };
  }

  /**
   * Look a project up in the cached batches of the date embedded in its id.
   * Never triggers generation.
   */
  async getById(id: string): Promise<Project> {
    const match = PROJECT_ID_PATTERN.exec(id);
    if (!match) {
      throw new NotFoundError('Project', id);
    }

    const date = match[1];
    let keys: string[];
    try {
      keys = await this.store.keys(CacheKeys.dailyForDate(date));
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Cache unavailable during project lookup', { id, error: error.message });
      throw new NotFoundError('Project', id);
    }

    for (const key of sortByBatchCount(keys)) {
      const batch = await this.readBatch(key).catch((error: unknown) => {
        if (error instanceof CacheUnavailableError) return null;
        throw error;
      });
      const project = batch?.projects.find((candidate) => candidate.id === id);
      if (project) {
        return project;
      }
    }

    throw new NotFoundError('Project', id);
  }

  async getStats(): Promise<StatsSnapshot> {
    const values: Record<StatCounter, number> = {
      total_generated: 0,
      ai_sourced: 0,
      fallback_sourced: 0,
      cache_hits: 0,
      cache_misses: 0,
    };

    try {
      for (const counter of STAT_COUNTERS) {
        const raw = await this.store.get(CacheKeys.stat(counter));
        values[counter] = raw ? parseInt(raw, 10) || 0 : 0;
      }
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Cache unavailable, stats are incomplete', { error: error.message });
    }

    const lookups = values.cache_hits + values.cache_misses;
    return {
      totalGenerated: values.total_generated,
      aiSourced: values.ai_sourced,
      fallbackSourced: values.fallback_sourced,
      cacheHits: values.cache_hits,
      cacheMisses: values.cache_misses,
      cacheHitRatio: lookups > 0 ? values.cache_hits / lookups : 0,
    };
  }

  /**
   * Remove the cached batches of one date, or of every date when none is given.
   */
  async clearCache(date?: string): Promise<number> {
    const pattern = date === undefined
      ? CacheKeys.allDaily()
      : CacheKeys.dailyForDate(validateDate(date));

    try {
      const removed = await this.store.delete(pattern);
      log.info('Cleared cached batches', { pattern, removed });
      return removed;
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Cache unavailable, nothing cleared', { pattern, error: error.message });
      return 0;
    }
  }

  /**
   * Cached batches of the previous `days` days, newest first. Dates without a
   * cached batch are skipped.
   */
  async getArchive(days = 7): Promise<ArchiveEntry[]> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_ARCHIVE_DAYS) {
      throw new ValidationError(`days must be an integer between 1 and ${MAX_ARCHIVE_DAYS}`, 'days');
    }

    const today = this.now();
    const archive: ArchiveEntry[] = [];

    for (let offset = 1; offset <= days; offset++) {
      const date = formatDate(new Date(today.getTime() - offset * 86400000));
      try {
        const keys = sortByBatchCount(await this.store.keys(CacheKeys.dailyForDate(date)));
        const largest = keys[keys.length - 1];
        const batch = largest ? await this.readBatch(largest) : null;
        if (batch) {
          archive.push({
            date,
            projects: batch.projects.slice(0, ARCHIVE_PREVIEW),
            total: batch.projects.length,
          });
        }
      } catch (error) {
        if (!(error instanceof CacheUnavailableError)) throw error;
        log.warn('Skipping archive date, cache unavailable', { date });
      }
    }

    return archive;
  }

  async health(): Promise<HealthReport> {
    const timestamp = this.now().toISOString();
    try {
      await this.store.ping();
      return { status: 'ok', cache: 'connected', timestamp };
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      return { status: 'degraded', cache: 'unavailable', timestamp };
    }
  }

  private async generateWithLock(
    key: string,
    date: string,
    count: number,
    previous: DailyBatch | null,
    signal?: AbortSignal
  ): Promise<DailyBatch> {
    const lockKey = CacheKeys.generationLock(date, count);
    const token = uuidv4();

    const acquired = await this.tryAcquire(lockKey, token);
    if (acquired === null) {
      return this.produceUncached(key, date, count);
    }
    if (acquired) {
      return this.produceAsHolder(key, lockKey, token, date, count, previous, 'idle');
    }

    this.transition(key, 'idle', 'waiting', 'lock_held');
    const published = await this.waitForPublish(key, lockKey, previous, signal);
    if (published) {
      this.transition(key, 'waiting', 'served', 'published_by_holder');
      return published;
    }

    // Grace period over: the holder died or is too slow
    const takenOver = await this.tryAcquire(lockKey, token);
    if (takenOver) {
      return this.produceAsHolder(key, lockKey, token, date, count, previous, 'waiting');
    }

    log.warn('Generation lock still held after grace period, serving templates', { key });
    const { batch } = this.templateBatch(date, count);
    await this.recordGenerated('fallback');
    this.transition(key, 'waiting', 'served', 'grace_elapsed');
    return batch;
  }

  /**
   * true: lock acquired, false: held by someone else, null: cache unreachable
   */
  private async tryAcquire(lockKey: string, token: string): Promise<boolean | null> {
    try {
      return await this.store.setIfAbsent(lockKey, token, this.lockTtlSeconds);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Cache unavailable, generating without lock', { lockKey, error: error.message });
      return null;
    }
  }

  private async produceAsHolder(
    key: string,
    lockKey: string,
    token: string,
    date: string,
    count: number,
    previous: DailyBatch | null,
    from: OrchestratorState
  ): Promise<DailyBatch> {
    try {
      // A holder that finished between our cache read and our lock acquisition
      const published = await this.readFresh(key, previous).catch((error: unknown) => {
        if (error instanceof CacheUnavailableError) return null;
        throw error;
      });
      if (published) {
        this.transition(key, from, 'served', 'published_by_holder');
        return published;
      }

      this.transition(key, from, 'generating', 'lock_acquired');
      const { batch, ttlSeconds } = await this.produce(date, count);
      try {
        await this.store.set(key, JSON.stringify(batch), ttlSeconds);
      } catch (error) {
        if (!(error instanceof CacheUnavailableError)) throw error;
        log.warn('Could not publish generated batch', { key, error: error.message });
      }
      this.transition(key, 'generating', 'served', batch.source === 'ai' ? 'generated' : 'fallback');
      return batch;
    } finally {
      await this.release(lockKey, token);
    }
  }

  private async produceUncached(key: string, date: string, count: number): Promise<DailyBatch> {
    this.transition(key, 'idle', 'generating', 'cache_unavailable');
    const { batch } = await this.produce(date, count);
    this.transition(key, 'generating', 'served', batch.source === 'ai' ? 'generated' : 'fallback');
    return batch;
  }

  private async release(lockKey: string, token: string): Promise<void> {
    try {
      const released = await this.store.deleteIfEquals(lockKey, token);
      if (!released) {
        log.warn('Generation lock expired before release', { lockKey });
      }
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.warn('Could not release generation lock, it will expire', { lockKey, error: error.message });
    }
  }

  /**
   * Poll for the batch the lock holder is producing. Gives up once the lock TTL
   * has elapsed or the lock disappears without a new batch.
   */
  private async waitForPublish(
    key: string,
    lockKey: string,
    previous: DailyBatch | null,
    signal?: AbortSignal
  ): Promise<DailyBatch | null> {
    const attempts = Math.max(1, Math.ceil((this.lockTtlSeconds * 1000) / this.policy.pollIntervalMs));

    for (let attempt = 1; attempt <= attempts; attempt++) {
      await sleep(this.policy.pollIntervalMs, undefined, { signal });

      try {
        const batch = await this.readFresh(key, previous);
        if (batch) {
          log.debug('Found batch published by lock holder', { key, attempt });
          return batch;
        }
        if ((await this.store.get(lockKey)) === null) {
          // The holder publishes before releasing, so look once more
          const late = await this.readFresh(key, previous);
          if (!late) {
            log.warn('Generation lock released without a new batch', { key, attempt });
          }
          return late;
        }
      } catch (error) {
        if (!(error instanceof CacheUnavailableError)) throw error;
        log.warn('Cache unavailable while waiting for generation', { key });
        return null;
      }
    }

    log.warn('Timed out waiting for generation', { key, attempts });
    return null;
  }

  private async produce(date: string, count: number): Promise<ProducedBatch> {
    try {
      const result = await this.adapter.generate({ count, seed: date });
      const batch = this.buildBatch(date, count, result.projects, 'ai', result.degraded || result.widened);
      await this.recordGenerated('ai');
      if (result.degraded) {
        log.warn('Serving degraded batch', {
          date,
          count,
          padded: result.projects.filter((project) => project.source === 'fallback').length,
        });
      }
      return { batch, ttlSeconds: this.policy.dailyTtlSeconds };
    } catch (error) {
      if (!(error instanceof GenerationUnavailableError)) throw error;
      log.warn('Generation unavailable, using template fallback', { date, count, reason: error.reason });
      const produced = this.templateBatch(date, count);
      await this.recordGenerated('fallback');
      return produced;
    }
  }

  private templateBatch(date: string, count: number): ProducedBatch {
    const sample = this.templates.sample(count, {}, date);
    const projects = sample.projects.map((draft): GeneratedProject => ({ draft, source: 'fallback' }));
    return {
      batch: this.buildBatch(date, count, projects, 'fallback', sample.widened),
      ttlSeconds: this.policy.fallbackTtlSeconds,
    };
  }

  private buildBatch(
    date: string,
    count: number,
    generated: GeneratedProject[],
    source: ProjectSource,
    degraded: boolean
  ): DailyBatch {
    const generatedAt = this.now().toISOString();
    return {
      date,
      count,
      projects: generated.map(({ draft, source: projectSource }, index) => ({
        ...draft,
        id: `${date}-${index + 1}`,
        source: projectSource,
        generatedAt,
      })),
      source,
      degraded,
      generatedAt,
    };
  }

  /**
   * The cached batch, unless it is the one this request already saw (forced
   * regeneration waits for a newer one).
   */
  private async readFresh(key: string, previous: DailyBatch | null): Promise<DailyBatch | null> {
    const batch = await this.readBatch(key);
    if (!batch || (previous && batch.generatedAt === previous.generatedAt)) {
      return null;
    }
    return batch;
  }

  private async readBatch(key: string): Promise<DailyBatch | null> {
    const raw = await this.store.get(key);
    if (raw === null) {
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      log.warn('Discarding unreadable cached batch', { key });
      return null;
    }

    const parsed = DailyBatchSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn('Discarding cached batch with unexpected shape', { key });
      return null;
    }
    return parsed.data;
  }

  private async recordGenerated(source: ProjectSource): Promise<void> {
    await this.bump('total_generated');
    await this.bump(source === 'ai' ? 'ai_sourced' : 'fallback_sourced');
  }

  private async bump(counter: StatCounter): Promise<void> {
    try {
      await this.store.increment(CacheKeys.stat(counter), STATS_TTL_SECONDS);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      log.debug('Stats counter skipped, cache unavailable', { counter });
    }
  }

  private transition(key: string, from: OrchestratorState, to: OrchestratorState, reason: string): void {
    const event: StateTransition = { key, from, to, reason };
    log.debug('State transition', { ...event });
    this.emit('transition', event);
  }
}

/**
 * The lock must outlive the slowest holder, otherwise waiters take it over while
 * the first AI call is still running.
 */
function lockTtlFor(policy: CachePolicyConfig, adapter: GenerationAdapter): number {
  const required = Math.floor(adapter.maxDurationMs / 1000) + 1;
  if (policy.lockTtlSeconds >= required) {
    return policy.lockTtlSeconds;
  }
  log.warn('Generation lock TTL shorter than the generation budget, extending it', {
    configured: policy.lockTtlSeconds,
    lockTtlSeconds: required,
    generationBudgetMs: adapter.maxDurationMs,
  });
  return required;
}

/**
 * Ascending by the count segment of `daily:<date>:<count>`
 */
function sortByBatchCount(keys: string[]): string[] {
  const countOf = (key: string) => parseInt(key.slice(key.lastIndexOf(':') + 1), 10) || 0;
  return [...keys].sort((a, b) => countOf(a) - countOf(b));
}

export function createProjectOrchestrator(options: OrchestratorOptions): ProjectOrchestrator {
  return new ProjectOrchestrator(options);
}
