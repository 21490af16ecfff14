/**
 * Tests for the AI generation adapter
 */

import { describe, it, expect } from 'vitest';
import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { GenerationAdapter, createUnconfiguredGenerator, describeDifficultyMix, buildPrompt, parseDrafts } from './index.js';
import { classifyProviderError } from './openai-provider.js';
import { createTemplateProvider } from '../templates/index.js';
import { GenerationUnavailableError, ProviderError } from '../../lib/errors.js';
import { ScriptedGenerator, draftsJson, makeDraft } from '../../tests/fakes.js';

const templates = createTemplateProvider();

function createAdapter(generator: ScriptedGenerator | ReturnType<typeof createUnconfiguredGenerator>, timeoutMs = 1000) {
  return new GenerationAdapter(generator, templates, { timeoutMs, retryBackoffMs: 0, year: () => 2025 });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseDrafts', () => {
  it('should extract the array from surrounding text', () => {
    const content = `Here are your projects:\n\`\`\`json\n${draftsJson(2)}\n\`\`\``;
    const { drafts, invalidEntries } = parseDrafts(content);

    expect(drafts.map((d) => d.title)).toEqual(['Generated Project 1', 'Generated Project 2']);
    expect(invalidEntries).toBe(0);
  });

  it('should drop invalid entries and count them', () => {
    const content = JSON.stringify([makeDraft(1), { title: 'Bad' }, makeDraft(3)]);
    const { drafts, invalidEntries } = parseDrafts(content);

    expect(drafts).toHaveLength(2);
    expect(invalidEntries).toBe(1);
  });

  it('should accept snake_case fields and unknown technology kinds', () => {
    const { title, description, difficulty, category, features } = makeDraft(1);
    const content = JSON.stringify([{
      title,
      description,
      difficulty,
      category,
      features,
      estimated_time: '3 days',
      technologies: [{ name: 'Vite', type: 'build-tool', reason: 'Fast dev server' }],
    }]);

    const [draft] = parseDrafts(content).drafts;
    expect(draft.estimatedTime).toBe('3 days');
    expect(draft.technologies).toEqual([{ name: 'Vite', kind: 'other', reason: 'Fast dev server' }]);
  });

  it('should reject content without an array', () => {
    expect(() => parseDrafts('Sorry, I cannot help with that.')).toThrow(GenerationUnavailableError);
  });

  it('should reject malformed JSON', () => {
    const error = (() => {
      try {
        parseDrafts('[{"title": "unterminated"');
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ reason: 'invalid_payload' });
  });

  it('should reject a response with no valid entries', () => {
    expect(() => parseDrafts('[{"title": "x"}]')).toThrow('No valid projects in generation response');
  });
});

describe('describeDifficultyMix', () => {
  it('should describe the default mix for five projects', () => {
    expect(describeDifficultyMix(5)).toBe('1 beginner, 2 intermediate, 2 advanced');
  });

  it('should fall back to a balanced mix', () => {
    expect(describeDifficultyMix(3)).toBe('a balanced mix');
    expect(describeDifficultyMix(8)).toBe('a balanced mix across the 8 projects');
  });

  it('should list preferred levels', () => {
    expect(describeDifficultyMix(5, ['beginner', 'advanced'])).toBe('preferably beginner, advanced');
  });
});

describe('buildPrompt', () => {
  it('should ask for the exact count and mention the category preference', () => {
    const prompt = buildPrompt({ count: 3, categoryPreference: 'Finance', year: 2025 });

    expect(prompt.count).toBe(3);
    expect(prompt.user).toContain('Generate exactly 3 unique and creative software project ideas for 2025.');
    expect(prompt.user).toContain('CATEGORIES: Preferably in: Finance');
  });
});

describe('GenerationAdapter', () => {
  it('should return AI projects when the response is complete', async () => {
    const generator = new ScriptedGenerator(draftsJson(3));
    const result = await createAdapter(generator).generate({ count: 3, seed: '2025-09-13' });

    expect(result.degraded).toBe(false);
    expect(result.projects.map((p) => p.source)).toEqual(['ai', 'ai', 'ai']);
    expect(generator.calls).toBe(1);
  });

  it('should trim surplus projects to the requested count', async () => {
    const result = await createAdapter(new ScriptedGenerator(draftsJson(6))).generate({ count: 4, seed: 's' });
    expect(result.projects).toHaveLength(4);
  });

  it('should pad a short response from templates and mark it degraded', async () => {
    const generator = new ScriptedGenerator(draftsJson(1));
    const result = await createAdapter(generator).generate({ count: 3, seed: '2025-09-13' });

    expect(result.degraded).toBe(true);
    expect(result.widened).toBe(false);
    expect(result.projects.map((p) => p.source)).toEqual(['ai', 'fallback', 'fallback']);
    expect(result.projects[0].draft.title).toBe('Generated Project 1');
  });

  it('should flag padding that had to drop an unmatched category', async () => {
    const generator = new ScriptedGenerator(draftsJson(1));
    const result = await createAdapter(generator).generate({
      count: 2,
      categoryPreference: 'Quantum Knitting',
      seed: '2025-09-13',
    });

    expect(result.degraded).toBe(true);
    expect(result.widened).toBe(true);
  });

  it('should report the longest time one generate call can take', () => {
    const adapter = new GenerationAdapter(new ScriptedGenerator(draftsJson(1)), templates, {
      timeoutMs: 30000,
      retryBackoffMs: 1000,
    });
    expect(adapter.maxDurationMs).toBe(61000);
  });

  it('should retry once after a server error', async () => {
    const generator = new ScriptedGenerator(new ProviderError('server', 'boom', 503), draftsJson(2));
    const result = await createAdapter(generator).generate({ count: 2, seed: 's' });

    expect(generator.calls).toBe(2);
    expect(result.projects).toHaveLength(2);
  });

  it('should give up after the second transient failure', async () => {
    const generator = new ScriptedGenerator(new ProviderError('server', 'boom', 500));
    const error = await captureError(createAdapter(generator).generate({ count: 2, seed: 's' }));

    expect(generator.calls).toBe(2);
    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ reason: 'server' });
  });

  it('should not retry quota failures', async () => {
    const generator = new ScriptedGenerator(new ProviderError('quota', 'insufficient balance', 402));
    const error = await captureError(createAdapter(generator).generate({ count: 2, seed: 's' }));

    expect(generator.calls).toBe(1);
    expect(error).toMatchObject({ reason: 'quota' });
  });

  it('should time out a hanging generator and retry once', async () => {
    const generator = new ScriptedGenerator(() => new Promise<string>(() => undefined));
    const error = await captureError(createAdapter(generator, 20).generate({ count: 2, seed: 's' }));

    expect(generator.calls).toBe(2);
    expect(error).toMatchObject({ reason: 'timeout' });
  });

  it('should not retry an unparseable payload', async () => {
    const generator = new ScriptedGenerator('no projects today');
    const error = await captureError(createAdapter(generator).generate({ count: 2, seed: 's' }));

    expect(generator.calls).toBe(1);
    expect(error).toMatchObject({ reason: 'invalid_payload' });
  });

  it('should pass preferences into the prompt', async () => {
    const generator = new ScriptedGenerator(draftsJson(2));
    await createAdapter(generator).generate({
      count: 2,
      difficultyPreference: ['advanced'],
      categoryPreference: 'DevOps',
      seed: 's',
    });

    expect(generator.prompts[0].user).toContain('DIFFICULTY MIX: preferably advanced');
    expect(generator.prompts[0].user).toContain('CATEGORIES: Preferably in: DevOps');
  });

  it('should report an unconfigured provider as a client failure', async () => {
    const error = await captureError(createAdapter(createUnconfiguredGenerator()).generate({ count: 1, seed: 's' }));
    expect(error).toMatchObject({ reason: 'client' });
  });
});

describe('classifyProviderError', () => {
  it('should treat 402 as quota', () => {
    expect(classifyProviderError(new APIError(402, undefined, 'Insufficient Balance', undefined)).kind).toBe('quota');
  });

  it('should treat 429 insufficient_quota as quota and other 429s as server', () => {
    expect(classifyProviderError(new APIError(429, { code: 'insufficient_quota' }, 'quota', undefined)).kind).toBe('quota');
    expect(classifyProviderError(new APIError(429, undefined, 'slow down', undefined)).kind).toBe('server');
  });

  it('should treat 5xx as server and other 4xx as client', () => {
    expect(classifyProviderError(new APIError(502, undefined, 'bad gateway', undefined)).kind).toBe('server');
    expect(classifyProviderError(new APIError(401, undefined, 'bad key', undefined)).kind).toBe('client');
  });

  it('should separate timeouts from connection failures', () => {
    expect(classifyProviderError(new APIConnectionTimeoutError()).kind).toBe('timeout');
    expect(classifyProviderError(new APIConnectionError({ message: 'ECONNREFUSED' })).kind).toBe('network');
  });

  it('should keep the status code', () => {
    expect(classifyProviderError(new APIError(503, undefined, 'down', undefined)).status).toBe(503);
  });
});
