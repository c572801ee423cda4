import { isValidObjectId } from 'mongoose';
import {
  Channel,
  ChannelFields,
  ChannelModel,
  fromChannelDocument,
  IChannelModel,
} from '../model/channel.model';

/**
 * Thrown by repositories when an insert collides with a unique key
 */
export class DuplicateKeyError extends Error {
  constructor(public readonly collection: string, public readonly key: string) {
    super(`Duplicate key in ${collection}: ${key}`);
    this.name = 'DuplicateKeyError';
  }
}

export const isMongoDuplicateKey = (error: unknown): boolean => {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
};

export type NewChannel = ChannelFields & Pick<Channel, 'secret_token'>;

export interface ChannelRepository {
  findById(id: string): Promise<Channel | null>;
  findBySecretToken(secretToken: string): Promise<Channel | null>;
  findAll(): Promise<Channel[]>;
  /**
   * @throws DuplicateKeyError when the secret token is already taken
   */
  insert(channel: NewChannel): Promise<Channel>;
  update(id: string, fields: ChannelFields): Promise<Channel | null>;
  delete(id: string): Promise<boolean>;
}

/**
 * ========================================
 * MONGODB CHANNEL REPOSITORY
 * ========================================
 */
export class MongoChannelRepository implements ChannelRepository {
  constructor(private readonly model: IChannelModel = ChannelModel) {}

  async findById(id: string): Promise<Channel | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.model.findById(id).lean();
    return doc ? fromChannelDocument(doc) : null;
  }

  async findBySecretToken(secretToken: string): Promise<Channel | null> {
    const doc = await this.model.findOne({ secret_token: secretToken }).lean();
    return doc ? fromChannelDocument(doc) : null;
  }

  async findAll(): Promise<Channel[]> {
    const docs = await this.model.find().sort({ createdAt: 1 }).lean();
    return docs.map(fromChannelDocument);
  }

  async insert(channel: NewChannel): Promise<Channel> {
    try {
      const doc = await this.model.create(channel);
      return fromChannelDocument(doc);
    } catch (error) {
      if (isMongoDuplicateKey(error)) {
        throw new DuplicateKeyError('channels', 'secret_token');
      }
      throw error;
    }
  }

  async update(id: string, fields: ChannelFields): Promise<Channel | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.model.findByIdAndUpdate(
      id,
      {
        $set: {
          name: fields.name,
          channel_url: fields.channel_url,
          channel_token: fields.channel_token,
        },
      },
      { new: true, runValidators: true }
    ).lean();
    return doc ? fromChannelDocument(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!isValidObjectId(id)) {
      return false;
    }
    const result = await this.model.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
