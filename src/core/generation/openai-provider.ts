import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { AiConfig } from '../../types/index.js';
import { ProviderError, errorMessage } from '../../lib/errors.js';
import type { ProjectGenerator } from './index.js';
import type { GenerationPrompt } from './prompt.js';

/**
 * Map SDK failures onto the adapter's failure kinds. Out-of-balance and quota
 * responses are terminal; 5xx and timeouts are worth one retry.
 */
export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof APIUserAbortError || error instanceof APIConnectionTimeoutError) {
    return new ProviderError('timeout', 'Generation request timed out', undefined, error);
  }

  if (error instanceof APIConnectionError) {
    return new ProviderError('network', `Generation provider unreachable: ${error.message}`, undefined, error);
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === 402 || (status === 429 && error.code === 'insufficient_quota')) {
      return new ProviderError('quota', `Generation quota exhausted: ${error.message}`, status, error);
    }
    if (status !== undefined && status >= 500) {
      return new ProviderError('server', `Generation provider error ${status}`, status, error);
    }
    if (status === 429) {
      return new ProviderError('server', 'Generation provider rate limited the request', status, error);
    }
    return new ProviderError('client', `Generation request rejected: ${error.message}`, status, error);
  }

  return new ProviderError('server', errorMessage(error), undefined, error);
}

export class OpenAIProjectGenerator implements ProjectGenerator {
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(config: AiConfig) {
    if (!config.apiKey) {
      throw new Error('AI_API_KEY is required for the OpenAI-compatible generator');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      // Retries are owned by the GenerationAdapter
      maxRetries: 0,
    });
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
  }

  async generate(prompt: GenerationPrompt, signal: AbortSignal): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          stream: false,
        },
        { signal }
      );

      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw classifyProviderError(error);
    }
  }
}

export function createOpenAIProjectGenerator(config: AiConfig): OpenAIProjectGenerator {
  return new OpenAIProjectGenerator(config);
}
