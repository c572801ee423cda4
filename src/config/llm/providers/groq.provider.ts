import Groq from 'groq-sdk';
import {
  ResponseGenerator,
  GroqProviderConfig,
  LLMError,
  LLMRateLimitError,
  LLMAuthenticationError
} from '../llm.interface';
import { DialogueMessage } from '../../../model/dialogue.model';
import { createLogger } from '../../../util/gateway.logger.utils';

const logger = createLogger('groq-provider');

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful customer support assistant. Answer the customer briefly and politely.';

// Only the tail of the dialogue is sent to the model
const HISTORY_WINDOW = 10;

interface GroqChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * ========================================
 * GROQ PROVIDER
 * ========================================
 */
export class GroqProvider implements ResponseGenerator {
  readonly name = 'groq';
  readonly model: string;
  private client: Groq;
  private temperature: number;
  private maxTokens: number;
  private systemPrompt: string;

  constructor(config: GroqProviderConfig) {
    if (!config.apiKey) {
      throw new Error('GROQ_API_KEY is required');
    }

    this.client = new Groq({
      apiKey: config.apiKey,
    });

    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

    logger.info('[Groq] Provider initialized', {
      model: this.model,
      temperature: this.temperature,
      maxTokens: this.maxTokens
    });
  }

  /**
   * Maps dialogue roles onto chat roles
   */
  static buildMessages(systemPrompt: string, history: DialogueMessage[]): GroqChatMessage[] {
    return [
      { role: 'system', content: systemPrompt },
      ...history.slice(-HISTORY_WINDOW).map((message): GroqChatMessage => ({
        role: message.role,
        content: message.text
      }))
    ];
  }

  async generateReply(history: DialogueMessage[]): Promise<string> {
    const startTime = Date.now();
    const messages = GroqProvider.buildMessages(this.systemPrompt, history);

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        stream: false,
      });

      const responseText = completion.choices[0]?.message?.content || '';

      logger.info('[Groq] ✓ Response received', {
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens || 0,
        latency: `${Date.now() - startTime}ms`,
        responseLength: responseText.length,
        finishReason: completion.choices[0]?.finish_reason || 'unknown'
      });

      return responseText;

    } catch (error: unknown) {
      const status = error instanceof Groq.APIError ? error.status : undefined;
      const message = error instanceof Error ? error.message : String(error);

      logger.error('[Groq] Request failed', {
        error: message,
        status,
        latency: `${Date.now() - startTime}ms`
      });

      if (status === 401) {
        throw new LLMAuthenticationError('groq');
      }

      if (status === 429) {
        const retryAfter = error instanceof Groq.APIError ? error.headers?.['retry-after'] : undefined;
        throw new LLMRateLimitError('groq', retryAfter ? parseInt(retryAfter, 10) : undefined);
      }

      throw new LLMError(message || 'Groq API request failed', 'groq', status);
    }
  }
}
