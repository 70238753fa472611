import ChatMessage from '../../models/ChatMessage';
import type { ChatHistoryStore } from './ChatHistoryStore';

export class MongoChatHistoryStore implements ChatHistoryStore {
  async append(sessionId: string, question: string, answer: string): Promise<void> {
    const timestamp = new Date();
    await ChatMessage.insertMany([
      { sessionId, from: 'user', text: question, timestamp },
      { sessionId, from: 'assistant', text: answer, timestamp }
    ]);
  }
}
