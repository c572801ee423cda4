import { Channel } from '../model/channel.model';
import { cloneDialogue, dialogueKey, DialogueMessage } from '../model/dialogue.model';
import { ResponseGenerator } from '../config/llm/llm.interface';
import { GenerationError } from '../middleware/gateway.errorHandler.middleware';
import { ChannelService } from './channel.service';
import { ConversationService } from './conversation.service';
import { ChannelNotifier } from './notifier.service';
import { PerKeyLock } from '../util/gateway.lock.utils';
import { createLogger, errorMessage, Logger } from '../util/gateway.logger.utils';

const baseLogger = createLogger('webhook-service');

export type MessageSender = 'customer' | 'employee';

export interface IncomingMessage {
  message_id: string;
  chat_id: string;
  text: string;
  message_sender: MessageSender;
}

export type WebhookResult =
  | { status: 'unauthorized' }
  | { status: 'already_processed' }
  | { status: 'employee_message_ignored' }
  | { status: 'processed'; response: string; delivered: boolean };

type CommitOutcome =
  | { status: 'already_processed' }
  | { status: 'employee_message_ignored' }
  | { status: 'committed'; response: string };

/**
 * ========================================
 * WEBHOOK SERVICE
 * ========================================
 *
 * Handles one inbound channel message:
 * authenticate -> load dialogue -> dedupe -> classify sender ->
 * generate reply -> commit -> notify channel.
 *
 * Everything between loading and committing a dialogue runs under a per-key
 * lock, so concurrent calls for the same (channel, chat) in this process
 * cannot overwrite each other's messages.
 */
export class WebhookService {
  private readonly lock = new PerKeyLock();

  constructor(
    private readonly channels: ChannelService,
    private readonly conversations: ConversationService,
    private readonly generator: ResponseGenerator,
    private readonly notifier: ChannelNotifier
  ) {}

  async handleNewMessage(
    secretToken: string,
    message: IncomingMessage,
    requestId?: string
  ): Promise<WebhookResult> {
    const logger = requestId ? baseLogger.child(requestId) : baseLogger;

    // 1. Authenticate
    const channel = await this.channels.resolve(secretToken);
    if (!channel) {
      logger.warn('[Webhook] Unknown secret token');
      return { status: 'unauthorized' };
    }

    logger.webhookReceived({
      channelId: channel.id,
      chatId: message.chat_id,
      messageId: message.message_id,
      sender: message.message_sender
    });

    // 2-6. Load, dedupe, classify, generate, commit
    const outcome = await this.lock.runExclusive(
      dialogueKey(channel.id, message.chat_id),
      () => this.processLocked(channel, message, logger)
    );

    if (outcome.status !== 'committed') {
      return outcome;
    }

    // 7. Notify; the commit stands whatever the delivery outcome
    const delivered = await this.notifier.deliver(
      channel.channel_url,
      channel.channel_token,
      message.chat_id,
      outcome.response
    );

    return { status: 'processed', response: outcome.response, delivered };
  }

  private async processLocked(
    channel: Channel,
    message: IncomingMessage,
    logger: Logger
  ): Promise<CommitOutcome> {
    const context = {
      channelId: channel.id,
      chatId: message.chat_id,
      messageId: message.message_id
    };

    const dialogue = await this.conversations.loadOrCreate(channel.id, message.chat_id);

    if (dialogue.processed_message_ids.includes(message.message_id)) {
      logger.messageDuplicate(context);
      return { status: 'already_processed' };
    }

    if (message.message_sender === 'employee') {
      const updated = cloneDialogue(dialogue);
      updated.processed_message_ids.push(message.message_id);
      await this.conversations.save(updated);

      logger.employeeIgnored(context);
      return { status: 'employee_message_ignored' };
    }

    const userMessage: DialogueMessage = {
      role: 'user',
      text: message.text,
      message_id: message.message_id
    };
    const history = [...dialogue.message_list, userMessage];

    const startTime = Date.now();
    let response: string;
    try {
      response = await this.generator.generateReply(history);
    } catch (error: unknown) {
      // Nothing has been written; a retry will generate again
      logger.error('[Webhook] Reply generation failed', {
        ...context,
        provider: this.generator.name,
        error: errorMessage(error)
      });
      throw new GenerationError('Response generation failed', error);
    }

    logger.replyGenerated({
      channelId: channel.id,
      chatId: message.chat_id,
      historyLength: history.length,
      responseLength: response.length,
      duration: Date.now() - startTime
    });

    const assistantMessage: DialogueMessage = {
      role: 'assistant',
      text: response
    };

    const updated = cloneDialogue(dialogue);
    updated.message_list.push(userMessage, assistantMessage);
    updated.processed_message_ids.push(message.message_id);
    await this.conversations.save(updated);

    return { status: 'committed', response };
  }
}
