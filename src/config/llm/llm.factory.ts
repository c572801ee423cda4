// provider selector

import { LLMOptions, ResponseGenerator } from './llm.interface';
import { GroqProvider } from './providers/groq.provider';
import { MockProvider } from './providers/mock.provider';
import { createLogger } from '../../util/gateway.logger.utils';

const logger = createLogger('llm-factory');

/**
 * ========================================
 * LLM FACTORY
 * ========================================
 *
 * Builds the response generator named by LLM_PROVIDER.
 *
 * Supported providers:
 * - mock (default)
 * - groq
 */
export function createResponseGenerator(options: LLMOptions): ResponseGenerator {
  logger.info('[LLM Factory] Initializing provider', {
    provider: options.provider
  });

  let generator: ResponseGenerator;

  switch (options.provider) {
    case 'groq':
      generator = new GroqProvider(options.groq);
      break;

    case 'mock':
      generator = new MockProvider(options.mock);
      break;

    default:
      throw new Error(`Unsupported LLM provider: ${String(options.provider)}. Supported providers: mock, groq`);
  }

  logger.info('[LLM Factory] ✓ Provider initialized', {
    provider: generator.name
  });

  return generator;
}
