import { DialogueMessage } from '../../model/dialogue.model';

/**
 * ========================================
 * RESPONSE GENERATOR INTERFACE (Provider-Agnostic)
 * ========================================
 *
 * Every provider turns a dialogue history into one reply.
 * Switch providers by changing LLM_PROVIDER.
 */
export interface ResponseGenerator {
  readonly name: string;

  /**
   * The last entry of history is the message being answered
   */
  generateReply(history: DialogueMessage[]): Promise<string>;
}

export interface GroqProviderConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  systemPrompt?: string;
}

export interface MockProviderConfig {
  minDelayMs: number;
  maxDelayMs: number;
  reply?: string;
}

export type LLMProviderName = 'mock' | 'groq';

export interface LLMOptions {
  provider: LLMProviderName;
  groq: GroqProviderConfig;
  mock: MockProviderConfig;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public provider: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

export class LLMRateLimitError extends LLMError {
  constructor(provider: string, retryAfter?: number) {
    super(
      `Rate limit exceeded for ${provider}${retryAfter ? `. Retry after ${retryAfter}s` : ''}`,
      provider,
      429
    );
    this.name = 'LLMRateLimitError';
  }
}

export class LLMAuthenticationError extends LLMError {
  constructor(provider: string) {
    super(`Authentication failed for ${provider}. Check API key.`, provider, 401);
    this.name = 'LLMAuthenticationError';
  }
}
