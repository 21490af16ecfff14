import { z } from 'zod';

export const MAX_PROJECT_COUNT = 10;
export const DEFAULT_PROJECT_COUNT = 5;

// Project content
export const DifficultyLevelEnum = z.enum(['beginner', 'intermediate', 'advanced']);
export type DifficultyLevel = z.infer<typeof DifficultyLevelEnum>;

export const TechnologyKindEnum = z.enum([
  'frontend', 'backend', 'database', 'devops', 'mobile', 'other'
]);
export type TechnologyKind = z.infer<typeof TechnologyKindEnum>;

export const ProjectSourceEnum = z.enum(['ai', 'fallback']);
export type ProjectSource = z.infer<typeof ProjectSourceEnum>;

export const TechnologySchema = z.object({
  name: z.string().trim().min(1).max(100),
  // Providers report kinds such as "framework" or "tool"; those land in "other"
  kind: TechnologyKindEnum.catch('other'),
  reason: z.string().trim().min(1).max(200),
});
export type Technology = z.infer<typeof TechnologySchema>;

export const ProjectDraftSchema = z.object({
  title: z.string().trim().min(5).max(150),
  description: z.string().trim().min(20).max(800),
  difficulty: DifficultyLevelEnum,
  estimatedTime: z.string().trim().min(3).max(50),
  category: z.string().trim().min(3).max(50),
  technologies: z.array(TechnologySchema).min(1).max(6),
  features: z.array(z.string().trim().min(1)).min(1).max(10),
});
export type ProjectDraft = z.infer<typeof ProjectDraftSchema>;

export const ProjectSchema = ProjectDraftSchema.extend({
  id: z.string().min(1),
  source: ProjectSourceEnum,
  generatedAt: z.string().datetime(),
});
export type Project = z.infer<typeof ProjectSchema>;

export const DailyBatchSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  count: z.number().int().min(1).max(MAX_PROJECT_COUNT),
  projects: z.array(ProjectSchema).min(1),
  source: ProjectSourceEnum,
  degraded: z.boolean(),
  generatedAt: z.string().datetime(),
});
export type DailyBatch = z.infer<typeof DailyBatchSchema>;

// Requests
export const GenerationRequestSchema = z.object({
  count: z.number({ invalid_type_error: 'count must be an integer' })
    .int('count must be an integer')
    .min(1, `count must be between 1 and ${MAX_PROJECT_COUNT}`)
    .max(MAX_PROJECT_COUNT, `count must be between 1 and ${MAX_PROJECT_COUNT}`)
    .default(DEFAULT_PROJECT_COUNT),
  difficultyPreference: z.array(DifficultyLevelEnum).optional(),
  categoryPreference: z.string().trim().min(1).max(50, 'categoryPreference must be at most 50 characters').optional(),
  // Custom batches never read the cache, so this is accepted and ignored
  forceRegenerate: z.boolean().default(false),
});
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

export interface DailyRequest {
  /** YYYY-MM-DD, defaults to the orchestrator clock's current day */
  date?: string;
  count?: number;
  forceRegenerate?: boolean;
  /** Aborts only this caller's wait for another generator */
  signal?: AbortSignal;
}

// Stats & reporting
export interface StatsSnapshot {
  totalGenerated: number;
  aiSourced: number;
  fallbackSourced: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRatio: number;
}

export interface ArchiveEntry {
  date: string;
  projects: Project[];
  total: number;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  cache: 'connected' | 'unavailable';
  timestamp: string;
}

// Configuration
export interface RedisConfig {
  url: string;
  opTimeoutMs: number;
}

export interface AiConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  retryBackoffMs: number;
}

export interface CachePolicyConfig {
  dailyTtlSeconds: number;
  fallbackTtlSeconds: number;
  lockTtlSeconds: number;
  pollIntervalMs: number;
}

export interface RateLimitSettings {
  windowSeconds: number;
  maxRequests: number;
  disabled: boolean;
  bypassKeys: string[];
}

export interface ServerConfig {
  port: number;
  host: string;
  maxBodySize: number;
}

export interface AppConfig {
  server: ServerConfig;
  redis?: RedisConfig;
  ai: AiConfig;
  cache: CachePolicyConfig;
  rateLimit: RateLimitSettings;
  logLevel: LogLevel;
}

export const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelEnum>;
