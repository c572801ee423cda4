import { Dialogue } from '../model/dialogue.model';
import { DuplicateKeyError } from '../repository/channel.repository';
import { DialogueRepository } from '../repository/dialogue.repository';
import { createLogger } from '../util/gateway.logger.utils';

const logger = createLogger('conversation-service');

export class ConversationService {
  constructor(private readonly dialogues: DialogueRepository) {}

  /**
   * Dialogue for (channel, chat), created empty on first contact
   */
  async loadOrCreate(chatBotId: string, chatId: string): Promise<Dialogue> {
    const existing = await this.dialogues.findByKey(chatBotId, chatId);
    if (existing) {
      return existing;
    }

    try {
      const created = await this.dialogues.insert(chatBotId, chatId);
      logger.info('[Dialogue] Created', { channelId: chatBotId, chatId });
      return created;
    } catch (error: unknown) {
      if (!(error instanceof DuplicateKeyError)) {
        throw error;
      }

      // Lost the insert race to a concurrent request: use the winner's dialogue
      const winner = await this.dialogues.findByKey(chatBotId, chatId);
      if (!winner) {
        throw error;
      }
      return winner;
    }
  }

  async save(dialogue: Dialogue): Promise<void> {
    await this.dialogues.replace(dialogue);
  }
}
