import mongoose, { Schema } from 'mongoose';

export interface IChatMessage {
  _id?: string;
  sessionId: string;
  from: 'user' | 'assistant';
  text: string;
  timestamp: Date;
  createdAt?: Date;
  updatedAt?: Date;
}

const ChatMessageSchema = new Schema<IChatMessage>({
  sessionId: {
    type: String,
    required: true
  },
  from: {
    type: String,
    required: true,
    enum: ['user', 'assistant']
  },
  text: {
    type: String,
    required: true,
    trim: true
  },
  timestamp: {
    type: Date,
    required: true,
    default: Date.now
  }
}, {
  timestamps: true,
  collection: 'chat_messages'
});

ChatMessageSchema.index({ sessionId: 1, timestamp: 1 });

export const ChatMessage = mongoose.model<IChatMessage>('ChatMessage', ChatMessageSchema);
export default ChatMessage;
