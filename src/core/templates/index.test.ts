import { describe, it, expect } from 'vitest';
import { createTemplateProvider, hashSeed, loadTemplateCatalog, seededShuffle, TemplateProvider } from './index.js';
import { makeDraft } from '../../tests/fakes.js';

describe('Template catalog', () => {
  it('should load and validate the bundled catalog', () => {
    const catalog = loadTemplateCatalog();
    expect(catalog).toHaveLength(16);
    expect(new Set(catalog.map((draft) => draft.difficulty))).toEqual(
      new Set(['beginner', 'intermediate', 'advanced'])
    );
  });
});

describe('seededShuffle', () => {
  it('should be deterministic for a seed', () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    expect(seededShuffle(items, '2025-09-13')).toEqual(seededShuffle(items, '2025-09-13'));
  });

  it('should keep every item', () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    expect([...seededShuffle(items, 'seed')].sort((a, b) => a - b)).toEqual(items);
  });

  it('should not modify its input', () => {
    const items = [1, 2, 3, 4];
    seededShuffle(items, 'seed');
    expect(items).toEqual([1, 2, 3, 4]);
  });

  it('should hash seeds to unsigned 32-bit integers', () => {
    expect(hashSeed('')).toBe(0x811c9dc5);
    expect(hashSeed('2025-09-13')).toBeGreaterThanOrEqual(0);
    expect(hashSeed('2025-09-13')).not.toBe(hashSeed('2025-09-14'));
  });
});

describe('TemplateProvider', () => {
  const provider = createTemplateProvider();

  it('should return the same projects for the same seed', () => {
    const first = provider.sample(5, {}, '2025-09-13');
    const second = provider.sample(5, {}, '2025-09-13');
    expect(first.projects.map((p) => p.title)).toEqual(second.projects.map((p) => p.title));
    expect(first.widened).toBe(false);
  });

  it('should return distinct projects while the pool allows', () => {
    const { projects } = provider.sample(10, {}, '2025-09-13');
    expect(new Set(projects.map((p) => p.title)).size).toBe(10);
  });

  it('should honor the difficulty preference', () => {
    const { projects, widened } = provider.sample(4, { difficultyPreference: ['beginner'] }, 'seed');
    expect(widened).toBe(false);
    expect(projects.every((p) => p.difficulty === 'beginner')).toBe(true);
  });

  it('should match categories case-insensitively by substring', () => {
    const { projects, widened } = provider.sample(2, { categoryPreference: 'devops' }, 'seed');
    expect(widened).toBe(false);
    expect(projects.map((p) => p.category)).toEqual(['DevOps Tools', 'DevOps Tools']);
  });

  it('should combine difficulty and category filters', () => {
    const { projects } = provider.sample(
      1,
      { difficultyPreference: ['advanced'], categoryPreference: 'Mobile' },
      'seed'
    );
    expect(projects[0].title).toBe('Offline-First Field Survey App');
  });

  it('should drop the category filter first when nothing matches', () => {
    const { projects, widened } = provider.sample(
      3,
      { difficultyPreference: ['beginner'], categoryPreference: 'Quantum Computing' },
      'seed'
    );
    expect(widened).toBe(true);
    expect(projects.every((p) => p.difficulty === 'beginner')).toBe(true);
  });

  it('should cycle through the pool when count exceeds it', () => {
    const small = new TemplateProvider([makeDraft(1), makeDraft(2)]);
    const { projects } = small.sample(5, {}, 'seed');

    expect(projects).toHaveLength(5);
    expect(projects[2]).toBe(projects[0]);
    expect(projects[3]).toBe(projects[1]);
    expect(projects[4]).toBe(projects[0]);
  });

  it('should reject an empty catalog', () => {
    expect(() => new TemplateProvider([])).toThrow('Template catalog must not be empty');
  });
});
