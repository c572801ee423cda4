import mongoose, { Schema, Model, Types } from 'mongoose';

// ========================================
// INTERFACES (TypeScript Types)
// ========================================

export const MESSAGE_ROLES = ['assistant', 'system', 'user'] as const;

export type MessageRole = typeof MESSAGE_ROLES[number];

/**
 * One turn in a dialogue. message_id is the channel's own identifier and is
 * only present on inbound user messages.
 */
export interface DialogueMessage {
  role: MessageRole;
  text: string;
  message_id?: string;
}

/**
 * Dialogue
 * The history between one channel and one external chat.
 * message_list is append-only; processed_message_ids is membership-only.
 */
export interface Dialogue {
  id: string;
  chat_bot_id: string;
  chat_id: string;
  message_list: DialogueMessage[];
  processed_message_ids: string[];
}

export const dialogueKey = (chatBotId: string, chatId: string): string => `${chatBotId}:${chatId}`;

export const cloneDialogue = (dialogue: Dialogue): Dialogue => ({
  ...dialogue,
  message_list: dialogue.message_list.map((message) => ({ ...message })),
  processed_message_ids: [...dialogue.processed_message_ids],
});

// ========================================
// SCHEMAS (MongoDB Structure)
// ========================================

export interface IDialogueMessageDocument {
  role: MessageRole;
  text: string;
  message_id?: string;
}

export interface IDialogueDocument {
  _id: Types.ObjectId;
  chat_bot_id: Types.ObjectId;
  chat_id: string;
  message_list: IDialogueMessageDocument[];
  processed_message_ids: string[];
  createdAt: Date;
  updatedAt: Date;
}

const DialogueMessageSchema = new Schema<IDialogueMessageDocument>({
  role: {
    type: String,
    required: true,
    enum: [...MESSAGE_ROLES],
  },
  text: {
    type: String,
    required: true,
  },
  message_id: String,
}, {
  _id: false,
});

const DialogueSchema = new Schema<IDialogueDocument>({
  chat_bot_id: {
    type: Schema.Types.ObjectId,
    ref: 'Channel',
    required: true,
  },
  // Not `required`: mongoose rejects '' for required strings, and channels may send it
  chat_id: {
    type: String,
    default: '',
  },
  message_list: {
    type: [DialogueMessageSchema],
    default: [],
  },
  processed_message_ids: {
    type: [String],
    default: [],
  },
}, {
  timestamps: true,
  collection: 'dialogues',
});

// At most one dialogue per (channel, chat)
DialogueSchema.index({ chat_bot_id: 1, chat_id: 1 }, { unique: true });

export type IDialogueModel = Model<IDialogueDocument>;

export const DialogueModel: IDialogueModel = mongoose.model<IDialogueDocument>('Dialogue', DialogueSchema);

export const fromDialogueDocument = (doc: IDialogueDocument): Dialogue => ({
  id: doc._id.toString(),
  chat_bot_id: doc.chat_bot_id.toString(),
  chat_id: doc.chat_id,
  message_list: doc.message_list.map((message) => ({
    role: message.role,
    text: message.text,
    ...(typeof message.message_id === 'string' ? { message_id: message.message_id } : {}),
  })),
  processed_message_ids: [...doc.processed_message_ids],
});

export default DialogueModel;
