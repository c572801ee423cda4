import {
  Channel,
  ChannelFields,
  ChannelRegistration,
  ChannelView,
  toChannelView,
} from '../model/channel.model';
import { ChannelRepository, DuplicateKeyError } from '../repository/channel.repository';
import { CryptoUtils } from '../util/gateway.crypto.utils';
import { createLogger } from '../util/gateway.logger.utils';

const logger = createLogger('channel-service');

const MAX_SECRET_ATTEMPTS = 3;

/**
 * ========================================
 * CHANNEL SERVICE
 * ========================================
 *
 * Directory of registered channels: resolves webhook secrets to channels and
 * owns the channel lifecycle. Secret tokens are generated here and disclosed
 * once, in the registration result.
 */
export class ChannelService {
  constructor(
    private readonly channels: ChannelRepository,
    private readonly generateSecret: () => string = () => CryptoUtils.generateSecretToken()
  ) {}

  /**
   * Channel owning the given webhook secret, or null
   */
  async resolve(secretToken: string): Promise<Channel | null> {
    if (!secretToken) {
      return null;
    }
    return this.channels.findBySecretToken(secretToken);
  }

  async create(fields: ChannelFields): Promise<ChannelRegistration> {
    for (let attempt = 1; attempt <= MAX_SECRET_ATTEMPTS; attempt++) {
      try {
        const channel = await this.channels.insert({
          name: fields.name,
          channel_url: fields.channel_url,
          channel_token: fields.channel_token,
          secret_token: this.generateSecret(),
        });

        logger.channelCreated({ channelId: channel.id, name: channel.name });

        return {
          id: channel.id,
          name: channel.name,
          secret_token: channel.secret_token,
        };
      } catch (error: unknown) {
        if (!(error instanceof DuplicateKeyError)) {
          throw error;
        }
        logger.warn('[Channel] Secret token collision, regenerating', { attempt });
      }
    }

    throw new Error('SECRET_TOKEN_GENERATION_EXHAUSTED');
  }

  async get(id: string): Promise<ChannelView | null> {
    const channel = await this.channels.findById(id);
    return channel ? toChannelView(channel) : null;
  }

  async list(): Promise<ChannelView[]> {
    const channels = await this.channels.findAll();
    return channels.map(toChannelView);
  }

  async update(id: string, fields: ChannelFields): Promise<ChannelView | null> {
    const channel = await this.channels.update(id, fields);
    if (channel) {
      logger.info('[Channel] Updated', { channelId: id });
    }
    return channel ? toChannelView(channel) : null;
  }

  /**
   * Dialogues of a deleted channel are left in place and never matched again
   */
  async delete(id: string): Promise<boolean> {
    const removed = await this.channels.delete(id);
    if (removed) {
      logger.info('[Channel] Deleted', { channelId: id });
    }
    return removed;
  }
}
