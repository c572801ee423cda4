import { isValidObjectId } from 'mongoose';
import {
  Dialogue,
  DialogueModel,
  fromDialogueDocument,
  IDialogueModel,
} from '../model/dialogue.model';
import { DuplicateKeyError, isMongoDuplicateKey } from './channel.repository';

export interface DialogueRepository {
  findByKey(chatBotId: string, chatId: string): Promise<Dialogue | null>;
  /**
   * Inserts an empty dialogue for the key.
   * @throws DuplicateKeyError when another writer created it first
   */
  insert(chatBotId: string, chatId: string): Promise<Dialogue>;
  /**
   * Replaces message_list and processed_message_ids wholesale. Last writer wins.
   */
  replace(dialogue: Dialogue): Promise<void>;
}

/**
 * ========================================
 * MONGODB DIALOGUE REPOSITORY
 * ========================================
 */
export class MongoDialogueRepository implements DialogueRepository {
  constructor(private readonly model: IDialogueModel = DialogueModel) {}

  async findByKey(chatBotId: string, chatId: string): Promise<Dialogue | null> {
    if (!isValidObjectId(chatBotId)) {
      return null;
    }
    const doc = await this.model.findOne({ chat_bot_id: chatBotId, chat_id: chatId }).lean();
    return doc ? fromDialogueDocument(doc) : null;
  }

  async insert(chatBotId: string, chatId: string): Promise<Dialogue> {
    try {
      const doc = await this.model.create({
        chat_bot_id: chatBotId,
        chat_id: chatId,
        message_list: [],
        processed_message_ids: [],
      });
      return fromDialogueDocument(doc);
    } catch (error) {
      if (isMongoDuplicateKey(error)) {
        throw new DuplicateKeyError('dialogues', `${chatBotId}:${chatId}`);
      }
      throw error;
    }
  }

  async replace(dialogue: Dialogue): Promise<void> {
    await this.model.updateOne(
      { _id: dialogue.id },
      {
        $set: {
          message_list: dialogue.message_list,
          processed_message_ids: dialogue.processed_message_ids,
        },
      }
    );
  }
}
