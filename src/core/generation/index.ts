/**
 * AI Generation Adapter
 *
 * Wraps the external ProjectGenerator with a timeout, a single retry for
 * transient failures, and per-entry validation of the returned payload.
 * Partial responses are padded from the template catalog; anything that leaves
 * no usable project surfaces as GenerationUnavailableError so the caller can
 * fall back completely.
 */

import { setTimeout as sleep } from 'timers/promises';
import {
  ProjectDraftSchema,
  type DifficultyLevel,
  type ProjectDraft,
  type ProjectSource,
} from '../../types/index.js';
import {
  GenerationUnavailableError,
  ProviderError,
  errorMessage,
} from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { TemplateProvider } from '../templates/index.js';
import { buildPrompt, type GenerationPrompt } from './prompt.js';

export { buildPrompt, describeDifficultyMix, type GenerationPrompt } from './prompt.js';

/**
 * External generative capability. Resolves to the raw text the model produced
 * and rejects with ProviderError on failure.
 */
export interface ProjectGenerator {
  generate(prompt: GenerationPrompt, signal: AbortSignal): Promise<string>;
}

export interface GenerationAdapterOptions {
  timeoutMs: number;
  retryBackoffMs: number;
  /** Year mentioned in the prompt, defaults to the current one */
  year?: () => number;
}

export interface AdapterRequest {
  count: number;
  difficultyPreference?: DifficultyLevel[];
  categoryPreference?: string;
  /** Seed for template padding, normally the batch date */
  seed: string;
}

export interface GeneratedProject {
  draft: ProjectDraft;
  source: ProjectSource;
}

export interface GenerationResult {
  projects: GeneratedProject[];
  /** Some projects were padded from templates */
  degraded: boolean;
  /** Padding had to ignore the difficulty or category preference */
  widened: boolean;
  invalidEntries: number;
}

export interface ParsedDrafts {
  drafts: ProjectDraft[];
  invalidEntries: number;
}

const MAX_ATTEMPTS = 2;

const log = createLogger('generation');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts the snake_case keys some models fall back to.
 */
function normalizeEntry(entry: unknown): unknown {
  if (!isRecord(entry)) {
    return entry;
  }

  const technologies = Array.isArray(entry.technologies)
    ? entry.technologies.map((tech) =>
        isRecord(tech) ? { ...tech, kind: tech.kind ?? tech.type } : tech
      )
    : entry.technologies;

  return {
    ...entry,
    estimatedTime: entry.estimatedTime ?? entry.estimated_time,
    technologies,
  };
}

/**
 * Extract and validate project drafts from model output. Text around the JSON
 * array is ignored; malformed entries are dropped and counted.
 */
export function parseDrafts(content: string): ParsedDrafts {
  const start = content.indexOf('[');
  const end = content.lastIndexOf(']');
  if (start === -1 || end <= start) {
    throw new GenerationUnavailableError('invalid_payload', 'No JSON array found in generation response');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new GenerationUnavailableError('invalid_payload', `Malformed JSON in generation response: ${errorMessage(error)}`, error);
  }

  if (!Array.isArray(payload)) {
    throw new GenerationUnavailableError('invalid_payload', 'Generation response is not a list');
  }

  const drafts: ProjectDraft[] = [];
  let invalidEntries = 0;

  payload.forEach((entry, index) => {
    const parsed = ProjectDraftSchema.safeParse(normalizeEntry(entry));
    if (parsed.success) {
      drafts.push(parsed.data);
    } else {
      invalidEntries++;
      log.warn('Dropping malformed project from generation response', {
        index,
        issue: parsed.error.issues[0]?.message,
        path: parsed.error.issues[0]?.path.join('.'),
      });
    }
  });

  if (drafts.length === 0) {
    throw new GenerationUnavailableError('invalid_payload', 'No valid projects in generation response');
  }

  return { drafts, invalidEntries };
}

export class GenerationAdapter {
  private generator: ProjectGenerator;
  private templates: TemplateProvider;
  private timeoutMs: number;
  private retryBackoffMs: number;
  private year: () => number;

  constructor(generator: ProjectGenerator, templates: TemplateProvider, options: GenerationAdapterOptions) {
    this.generator = generator;
    this.templates = templates;
    this.timeoutMs = options.timeoutMs;
    this.retryBackoffMs = options.retryBackoffMs;
    this.year = options.year || (() => new Date().getFullYear());
  }

  /**
   * Longest a single `generate` call can take: every attempt timing out plus
   * the backoff between them.
   */
  get maxDurationMs(): number {
    return MAX_ATTEMPTS * this.timeoutMs + (MAX_ATTEMPTS - 1) * this.retryBackoffMs;
  }

  async generate(request: AdapterRequest): Promise<GenerationResult> {
    const prompt = buildPrompt({
      count: request.count,
      difficultyPreference: request.difficultyPreference,
      categoryPreference: request.categoryPreference,
      year: this.year(),
    });

    const content = await this.callWithRetry(prompt);
    const { drafts, invalidEntries } = parseDrafts(content);

    const projects: GeneratedProject[] = drafts
      .slice(0, request.count)
      .map((draft): GeneratedProject => ({ draft, source: 'ai' }));

    const missing = request.count - projects.length;
    let widened = false;
    if (missing > 0) {
      log.warn('Generation returned fewer projects than requested, padding from templates', {
        requested: request.count,
        valid: projects.length,
        invalidEntries,
      });
      const padding = this.templates.sample(
        missing,
        {
          difficultyPreference: request.difficultyPreference,
          categoryPreference: request.categoryPreference,
        },
        request.seed
      );
      for (const draft of padding.projects) {
        projects.push({ draft, source: 'fallback' });
      }
      widened = padding.widened;
    }

    return { projects, degraded: missing > 0, widened, invalidEntries };
  }

  private async callWithRetry(prompt: GenerationPrompt): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.callOnce(prompt);
      } catch (error) {
        const providerError = error instanceof ProviderError
          ? error
          : new ProviderError('server', errorMessage(error), undefined, error);

        if (providerError.transient && attempt < MAX_ATTEMPTS) {
          log.warn('Transient generation failure, retrying', {
            attempt,
            kind: providerError.kind,
            backoffMs: this.retryBackoffMs,
          });
          await sleep(this.retryBackoffMs);
          continue;
        }

        log.error('Generation unavailable', {
          attempts: attempt,
          kind: providerError.kind,
          error: providerError.message,
        });
        throw new GenerationUnavailableError(providerError.kind, providerError.message, providerError);
      }
    }
  }

  private async callOnce(prompt: GenerationPrompt): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderError('timeout', `Generation timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.generator.generate(prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Generator used when no provider is configured; every request goes straight
 * to the template fallback.
 */
export function createUnconfiguredGenerator(): ProjectGenerator {
  return {
    async generate(): Promise<string> {
      throw new ProviderError('client', 'No AI provider configured');
    },
  };
}

export function createGenerationAdapter(
  generator: ProjectGenerator,
  templates: TemplateProvider,
  options: GenerationAdapterOptions
): GenerationAdapter {
  return new GenerationAdapter(generator, templates, options);
}
