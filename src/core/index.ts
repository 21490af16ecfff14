/**
 * Core Module Exports
 *
 * Central export point for the engine: orchestrator, generation and templates.
 */

// Project Orchestrator
export {
  ProjectOrchestrator,
  createProjectOrchestrator,
  formatDate,
  validateCount,
  validateDate,
  validateGenerationRequest,
  type CustomGeneration,
  type OrchestratorOptions,
  type OrchestratorState,
  type StateTransition,
} from './orchestrator/index.js';

// AI Generation
export {
  GenerationAdapter,
  createGenerationAdapter,
  createUnconfiguredGenerator,
  parseDrafts,
  buildPrompt,
  describeDifficultyMix,
  type AdapterRequest,
  type GeneratedProject,
  type GenerationAdapterOptions,
  type GenerationPrompt,
  type GenerationResult,
  type ProjectGenerator,
} from './generation/index.js';
export {
  OpenAIProjectGenerator,
  createOpenAIProjectGenerator,
  classifyProviderError,
} from './generation/openai-provider.js';

// Template Fallback
export {
  TemplateProvider,
  createTemplateProvider,
  getTemplateProvider,
  loadTemplateCatalog,
  seededShuffle,
  type TemplateConstraints,
  type TemplateSample,
} from './templates/index.js';
