/**
 * Template Fallback Provider
 *
 * Serves pre-authored projects when AI generation is unavailable or falls
 * short. Selection is a seeded shuffle of the filtered catalog, so the same
 * seed (the batch date) yields the same projects for the whole day.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  ProjectDraftSchema,
  type DifficultyLevel,
  type ProjectDraft,
} from '../../types/index.js';
import { createLogger } from '../../lib/logger.js';

export interface TemplateConstraints {
  difficultyPreference?: DifficultyLevel[];
  categoryPreference?: string;
}

export interface TemplateSample {
  projects: ProjectDraft[];
  /** True when the preferences matched nothing and had to be relaxed */
  widened: boolean;
}

const DEFAULT_CATALOG_URL = new URL('../../../data/templates.json', import.meta.url);

const log = createLogger('templates');

export function loadTemplateCatalog(source: URL | string = DEFAULT_CATALOG_URL): ProjectDraft[] {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return z.array(ProjectDraftSchema).min(1).parse(raw);
}

/**
 * FNV-1a, used to turn the seed string into a PRNG state.
 */
export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// mulberry32
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seededShuffle<T>(items: readonly T[], seed: string): T[] {
  const random = createRandom(hashSeed(seed));
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class TemplateProvider {
  private catalog: ProjectDraft[];

  constructor(catalog: ProjectDraft[]) {
    if (catalog.length === 0) {
      throw new Error('Template catalog must not be empty');
    }
    this.catalog = catalog;
  }

  get size(): number {
    return this.catalog.length;
  }

  /**
   * Pick `count` templates for `seed`. Cycles through the shuffled pool when
   * `count` exceeds the number of candidates.
   */
  sample(count: number, constraints: TemplateConstraints, seed: string): TemplateSample {
    const { candidates, widened } = this.candidates(constraints);
    if (widened) {
      log.warn('Template preferences matched nothing, widening filter', {
        difficultyPreference: constraints.difficultyPreference,
        categoryPreference: constraints.categoryPreference,
      });
    }

    const shuffled = seededShuffle(candidates, seed);
    const projects: ProjectDraft[] = [];
    for (let i = 0; i < count; i++) {
      projects.push(shuffled[i % shuffled.length]);
    }

    return { projects, widened };
  }

  private candidates(constraints: TemplateConstraints): { candidates: ProjectDraft[]; widened: boolean } {
    const difficulties = constraints.difficultyPreference?.length
      ? new Set(constraints.difficultyPreference)
      : null;
    const category = constraints.categoryPreference?.trim().toLowerCase() || null;

    const byDifficulty = (draft: ProjectDraft) => !difficulties || difficulties.has(draft.difficulty);
    const byCategory = (draft: ProjectDraft) =>
      !category || draft.category.toLowerCase().includes(category);

    const exact = this.catalog.filter((draft) => byDifficulty(draft) && byCategory(draft));
    if (exact.length > 0) {
      return { candidates: exact, widened: false };
    }

    // Category is the narrower preference, so it is dropped first
    const difficultyOnly = this.catalog.filter(byDifficulty);
    if (difficultyOnly.length > 0) {
      return { candidates: difficultyOnly, widened: true };
    }

    return { candidates: this.catalog, widened: true };
  }
}

export function createTemplateProvider(catalog: ProjectDraft[] = loadTemplateCatalog()): TemplateProvider {
  return new TemplateProvider(catalog);
}

let defaultProvider: TemplateProvider | null = null;

export function getTemplateProvider(): TemplateProvider {
  if (!defaultProvider) {
    defaultProvider = createTemplateProvider();
  }
  return defaultProvider;
}
