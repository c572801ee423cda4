import { ResponseGenerator, MockProviderConfig } from '../llm.interface';
import { DialogueMessage } from '../../../model/dialogue.model';
import { createLogger } from '../../../util/gateway.logger.utils';

const logger = createLogger('mock-provider');

export const MOCK_REPLY = 'New message from llm';

/**
 * ========================================
 * MOCK PROVIDER
 * ========================================
 *
 * Stands in for a real model: waits a random delay inside the configured
 * window, then answers with a fixed reply.
 */
export class MockProvider implements ResponseGenerator {
  readonly name = 'mock';
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly reply: string;

  constructor(config: MockProviderConfig) {
    this.minDelayMs = config.minDelayMs;
    this.maxDelayMs = Math.max(config.minDelayMs, config.maxDelayMs);
    this.reply = config.reply ?? MOCK_REPLY;
  }

  async generateReply(history: DialogueMessage[]): Promise<string> {
    const delay = this.minDelayMs + Math.floor(Math.random() * (this.maxDelayMs - this.minDelayMs + 1));

    logger.debug('[Mock] Generating reply', {
      historyLength: history.length,
      delay
    });

    await new Promise<void>((resolve) => setTimeout(resolve, delay));
    return this.reply;
  }
}
