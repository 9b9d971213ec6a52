import type { ConversationTurn } from "../rag/types.js";

export const MAX_SESSION_MESSAGES = 20;

export interface ConversationStorePort {
  getHistory(sessionId: string): ConversationTurn[];
  append(sessionId: string, ...turns: ConversationTurn[]): void;
  clear(sessionId: string): boolean;
}

export class InMemoryConversationStore implements ConversationStorePort {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  constructor(private readonly maxMessages = MAX_SESSION_MESSAGES) {}

  getHistory(sessionId: string): ConversationTurn[] {
    return (this.sessions.get(sessionId) ?? []).map((turn) => ({ ...turn }));
  }

  append(sessionId: string, ...turns: ConversationTurn[]): void {
    const history = [...(this.sessions.get(sessionId) ?? []), ...turns.map((turn) => ({ ...turn }))];
    this.sessions.set(sessionId, history.slice(-this.maxMessages));
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}

let defaultStore: InMemoryConversationStore | null = null;

export const getConversationStore = (): InMemoryConversationStore => {
  if (!defaultStore) {
    defaultStore = new InMemoryConversationStore();
  }
  return defaultStore;
};

export const resetConversationStoreForTests = (): void => {
  defaultStore = null;
};
