import { Types } from 'mongoose';
import { Channel, ChannelFields } from '../model/channel.model';
import { cloneDialogue, Dialogue, dialogueKey } from '../model/dialogue.model';
import { ChannelRepository, DuplicateKeyError, NewChannel } from './channel.repository';
import { DialogueRepository } from './dialogue.repository';

/**
 * ========================================
 * IN-MEMORY REPOSITORIES
 * ========================================
 *
 * Process-local stand-ins for the MongoDB collections. Records are copied on
 * the way in and out so callers never share state with the store, the same
 * way documents read from MongoDB are independent copies.
 * Used by STORAGE_DRIVER=memory and by the tests.
 */

const newObjectId = (): string => new Types.ObjectId().toString();

export class InMemoryChannelRepository implements ChannelRepository {
  private readonly channels = new Map<string, Channel>();

  async findById(id: string): Promise<Channel | null> {
    const channel = this.channels.get(id);
    return channel ? { ...channel } : null;
  }

  async findBySecretToken(secretToken: string): Promise<Channel | null> {
    for (const channel of this.channels.values()) {
      if (channel.secret_token === secretToken) {
        return { ...channel };
      }
    }
    return null;
  }

  async findAll(): Promise<Channel[]> {
    return Array.from(this.channels.values(), (channel) => ({ ...channel }));
  }

  async insert(channel: NewChannel): Promise<Channel> {
    for (const existing of this.channels.values()) {
      if (existing.secret_token === channel.secret_token) {
        throw new DuplicateKeyError('channels', 'secret_token');
      }
    }

    const created: Channel = { id: newObjectId(), ...channel };
    this.channels.set(created.id, created);
    return { ...created };
  }

  async update(id: string, fields: ChannelFields): Promise<Channel | null> {
    const existing = this.channels.get(id);
    if (!existing) {
      return null;
    }

    const updated: Channel = {
      ...existing,
      name: fields.name,
      channel_url: fields.channel_url,
      channel_token: fields.channel_token,
    };
    this.channels.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    return this.channels.delete(id);
  }

  get size(): number {
    return this.channels.size;
  }
}

export class InMemoryDialogueRepository implements DialogueRepository {
  private readonly dialogues = new Map<string, Dialogue>();

  async findByKey(chatBotId: string, chatId: string): Promise<Dialogue | null> {
    const dialogue = this.dialogues.get(dialogueKey(chatBotId, chatId));
    return dialogue ? cloneDialogue(dialogue) : null;
  }

  async insert(chatBotId: string, chatId: string): Promise<Dialogue> {
    const key = dialogueKey(chatBotId, chatId);
    if (this.dialogues.has(key)) {
      throw new DuplicateKeyError('dialogues', key);
    }

    const created: Dialogue = {
      id: newObjectId(),
      chat_bot_id: chatBotId,
      chat_id: chatId,
      message_list: [],
      processed_message_ids: [],
    };
    this.dialogues.set(key, created);
    return cloneDialogue(created);
  }

  async replace(dialogue: Dialogue): Promise<void> {
    const key = dialogueKey(dialogue.chat_bot_id, dialogue.chat_id);
    const existing = this.dialogues.get(key);
    if (!existing || existing.id !== dialogue.id) {
      return;
    }
    this.dialogues.set(key, cloneDialogue(dialogue));
  }

  /**
   * Every stored dialogue, as independent copies
   */
  all(): Dialogue[] {
    return Array.from(this.dialogues.values(), cloneDialogue);
  }
}
