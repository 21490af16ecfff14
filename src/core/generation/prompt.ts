import type { DifficultyLevel } from '../../types/index.js';

export interface GenerationPrompt {
  system: string;
  user: string;
  count: number;
}

export interface PromptOptions {
  count: number;
  difficultyPreference?: DifficultyLevel[];
  categoryPreference?: string;
  year: number;
}

const SUGGESTED_CATEGORIES = [
  'Web Applications',
  'Mobile Apps',
  'Developer Tools',
  'APIs & Microservices',
  'Data Analysis',
  'Automation Tools',
];

const TECH_TRENDS = [
  'React Server Components',
  'TypeScript 5',
  'Tailwind CSS',
  'tRPC',
  'Supabase',
  'Astro',
  'SvelteKit',
  'Drizzle ORM',
  'FastAPI',
  'Docker & Kubernetes',
];

const SYSTEM_PROMPT = `You are a senior software architect and mentor who designs practical, motivating project ideas for developers of every level.

Respond ONLY with a valid JSON array. Do not add any text before or after it.

Every project:
- solves a real problem
- uses current, relevant technologies
- has a scope that matches its difficulty
- lists specific, concrete features

Difficulty levels:
- beginner: 1-3 days, core concepts, few technologies
- intermediate: 3-7 days, integrates several systems
- advanced: 1-3 weeks, complex architecture and optimisation`;

export function describeDifficultyMix(count: number, preference?: DifficultyLevel[]): string {
  if (preference && preference.length > 0) {
    return `preferably ${preference.join(', ')}`;
  }
  if (count === 5) {
    return '1 beginner, 2 intermediate, 2 advanced';
  }
  return count <= 3 ? 'a balanced mix' : `a balanced mix across the ${count} projects`;
}

export function buildPrompt(options: PromptOptions): GenerationPrompt {
  const { count, difficultyPreference, categoryPreference, year } = options;

  const categoryHint = categoryPreference
    ? `Preferably in: ${categoryPreference}`
    : `Vary between: ${SUGGESTED_CATEGORIES.join(', ')}`;

  const user = `Generate exactly ${count} unique and creative software project ideas for ${year}.

DIFFICULTY MIX: ${describeDifficultyMix(count, difficultyPreference)}
CATEGORIES: ${categoryHint}
CURRENT TRENDS TO CONSIDER: ${TECH_TRENDS.join(', ')}

Each array element must have exactly this shape:

{
  "title": "Short, memorable project name",
  "description": "2-3 sentences on the problem it solves and why it is worth building",
  "difficulty": "beginner|intermediate|advanced",
  "estimatedTime": "realistic duration, e.g. 2-3 days, 1 week, 2-3 weeks",
  "category": "specific project category",
  "technologies": [
    { "name": "Technology name", "kind": "frontend|backend|database|devops|mobile|other", "reason": "Why this technology fits" }
  ],
  "features": ["specific feature 1", "specific feature 2", "specific feature 3"]
}

REQUIREMENTS:
1. 2-5 technologies per project
2. Features are concrete functionality, not generalities
3. Titles are unique
4. Technologies match the difficulty level

RESPOND ONLY WITH THE JSON ARRAY.`;

  return { system: SYSTEM_PROMPT, user, count };
}
