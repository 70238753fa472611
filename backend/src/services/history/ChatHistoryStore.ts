export interface ChatExchange {
  sessionId: string;
  question: string;
  answer: string;
  timestamp: Date;
}

/** Append-only log of answered questions, keyed by session. */
export interface ChatHistoryStore {
  append(sessionId: string, question: string, answer: string): Promise<void>;
}

export class InMemoryChatHistoryStore implements ChatHistoryStore {
  private readonly exchanges: ChatExchange[] = [];

  async append(sessionId: string, question: string, answer: string): Promise<void> {
    this.exchanges.push({ sessionId, question, answer, timestamp: new Date() });
  }

  getSession(sessionId: string): ChatExchange[] {
    return this.exchanges.filter(exchange => exchange.sessionId === sessionId);
  }
}
