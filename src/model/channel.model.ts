import mongoose, { Schema, Model, Types } from 'mongoose';

// ========================================
// INTERFACES (TypeScript Types)
// ========================================

/**
 * Channel
 * A registered chatbot integration. The secret token authenticates the
 * channel's inbound webhook calls; channel_url/channel_token are used when
 * the gateway calls back with a reply.
 */
export interface Channel {
  id: string;
  name: string;
  channel_url: string;
  channel_token: string;
  secret_token: string;
}

/**
 * What the API discloses about a channel after creation
 */
export interface ChannelView {
  id: string;
  name: string;
  channel_url: string;
}

/**
 * Returned exactly once, at registration
 */
export interface ChannelRegistration {
  id: string;
  name: string;
  secret_token: string;
}

export type ChannelFields = Pick<Channel, 'name' | 'channel_url' | 'channel_token'>;

export const toChannelView = (channel: Channel): ChannelView => ({
  id: channel.id,
  name: channel.name,
  channel_url: channel.channel_url,
});

// ========================================
// SCHEMA (MongoDB Structure)
// ========================================

export interface IChannelDocument {
  _id: Types.ObjectId;
  name: string;
  channel_url: string;
  channel_token: string;
  secret_token: string;
  createdAt: Date;
  updatedAt: Date;
}

const ChannelSchema = new Schema<IChannelDocument>({
  name: {
    type: String,
    required: true,
    trim: true,
  },
  channel_url: {
    type: String,
    required: true,
    trim: true,
  },
  channel_token: {
    type: String,
    required: true,
  },
  secret_token: {
    type: String,
    required: true,
    unique: true,
    immutable: true,
    index: true,
  },
}, {
  timestamps: true,
  collection: 'channels',
});

export type IChannelModel = Model<IChannelDocument>;

export const ChannelModel: IChannelModel = mongoose.model<IChannelDocument>('Channel', ChannelSchema);

export const fromChannelDocument = (doc: IChannelDocument): Channel => ({
  id: doc._id.toString(),
  name: doc.name,
  channel_url: doc.channel_url,
  channel_token: doc.channel_token,
  secret_token: doc.secret_token,
});

export default ChannelModel;
