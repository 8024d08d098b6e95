import type { ChatMessage, ChatThread } from '@/src/shared/chat';
import type { ChatStore, SaveMessageInput } from '@/src/server/chatStore';

export interface InMemoryChatStore extends ChatStore {
  threads: Map<string, ChatThread>;
  messages: ChatMessage[];
  addMember(graphId: string, userId: string): void;
  seedThread(thread: Partial<ChatThread> & Pick<ChatThread, 'id' | 'graphId' | 'userId'>): ChatThread;
  seedMessage(message: Partial<ChatMessage> & Pick<ChatMessage, 'id' | 'threadId' | 'role' | 'content'>): ChatMessage;
  /** Replaces saveMessage for assistant rows only. */
  failAssistantSaves(error: Error): void;
}

export function createInMemoryChatStore(): InMemoryChatStore {
  const threads = new Map<string, ChatThread>();
  const messages: ChatMessage[] = [];
  const members = new Set<string>();
  let clock = Date.parse('2025-01-01T00:00:00.000Z');
  let assistantSaveError: Error | null = null;
  let ids = 0;

  const tick = () => {
    clock += 1000;
    return new Date(clock).toISOString();
  };

  const save = (input: SaveMessageInput): ChatMessage => {
    ids += 1;
    const message: ChatMessage = {
      id: input.id ?? `generated-${ids}`,
      threadId: input.threadId,
      role: input.role,
      content: input.content,
      createdAt: tick()
    };
    messages.push(message);
    return message;
  };

  return {
    threads,
    messages,
    addMember(graphId, userId) {
      members.add(`${graphId}:${userId}`);
    },
    seedThread(thread) {
      const createdAt = tick();
      const full: ChatThread = { summary: null, createdAt, updatedAt: createdAt, ...thread };
      threads.set(full.id, full);
      return full;
    },
    seedMessage(message) {
      const full: ChatMessage = { createdAt: tick(), ...message };
      messages.push(full);
      return full;
    },
    failAssistantSaves(error) {
      assistantSaveError = error;
    },

    async createThread({ graphId, userId }) {
      ids += 1;
      const createdAt = tick();
      const thread: ChatThread = { id: `thread-${ids}`, graphId, userId, summary: null, createdAt, updatedAt: createdAt };
      threads.set(thread.id, thread);
      return thread;
    },
    async getThread(threadId) {
      return threads.get(threadId) ?? null;
    },
    async listThreadsByGraph(graphId) {
      return [...threads.values()].filter((thread) => thread.graphId === graphId);
    },
    async setThreadSummary(threadId, summary) {
      const thread = threads.get(threadId);
      if (thread) {
        threads.set(threadId, { ...thread, summary });
      }
    },
    async saveMessage(input) {
      if (input.role === 'assistant' && assistantSaveError) {
        throw assistantSaveError;
      }
      return save(input);
    },
    async getMessage(threadId, messageId) {
      return messages.find((message) => message.threadId === threadId && message.id === messageId) ?? null;
    },
    async listMessages(threadId, { limit, offset }) {
      return messages.filter((message) => message.threadId === threadId).slice(offset, offset + limit);
    },
    async listRecentMessages(threadId, limit) {
      return messages.filter((message) => message.threadId === threadId).slice(-limit);
    },
    async isGraphMember(graphId, userId) {
      return members.has(`${graphId}:${userId}`);
    }
  };
}
