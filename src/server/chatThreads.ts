// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { ChatMessage, ChatMessagesPage, ChatThread } from '@/src/shared/chat';
import { CHAT_LIMITS } from '@/src/shared/chatLimits';
import type { ChatStore, ListMessagesOptions } from '@/src/server/chatStore';
import { requireAuthorized, type ChatGuard } from '@/src/server/chatGuard';
import { forbidden } from '@/src/server/http';

/** Counts code points so a summary never ends on half a surrogate pair. */
export function summarizeFirstMessage(content: string): string {
  const trimmed = content.trim();
  const chars = Array.from(trimmed);
  if (chars.length <= CHAT_LIMITS.summaryMaxChars) {
    return trimmed;
  }
  return `${chars.slice(0, CHAT_LIMITS.summaryMaxChars - 3).join('')}...`;
}

export interface ThreadScope {
  graphId: string;
  threadId: string;
  userId: string;
}

export interface ChatThreadService {
  listThreads(graphId: string, userId: string): Promise<ChatThread[]>;
  createThread(graphId: string, userId: string): Promise<ChatThread>;
  listMessages(scope: ThreadScope, options: ListMessagesOptions): Promise<ChatMessagesPage>;
  sendUserMessage(scope: ThreadScope & { content: string }): Promise<ChatMessage>;
}

export function createChatThreadService(deps: { store: ChatStore; guard: ChatGuard }): ChatThreadService {
  const { store, guard } = deps;

  const requireMember = async (graphId: string, userId: string) => {
    if (!(await store.isGraphMember(graphId, userId))) {
      throw forbidden("You don't have access to this graph");
    }
  };

  return {
    async listThreads(graphId, userId) {
      await requireMember(graphId, userId);
      return store.listThreadsByGraph(graphId);
    },

    async createThread(graphId, userId) {
      await requireMember(graphId, userId);
      const thread = await store.createThread({ graphId, userId });
      console.info('[chat] thread created', { graphId, userId, threadId: thread.id });
      return thread;
    },

    async listMessages(scope, options) {
      requireAuthorized(await guard.checkThreadAccess(scope));
      const limit = options.limit > 0 ? options.limit : CHAT_LIMITS.messagesPageSize;
      const offset = Math.max(0, options.offset);
      const messages = await store.listMessages(scope.threadId, { limit, offset });
      return { messages, hasMore: messages.length === limit };
    },

    async sendUserMessage({ content, ...scope }) {
      const thread = requireAuthorized(await guard.check({ ...scope, content }));
      const message = await store.saveMessage({ threadId: thread.id, role: 'user', content });

      if (thread.summary === null) {
        try {
          await store.setThreadSummary(thread.id, summarizeFirstMessage(content));
        } catch (error) {
          console.warn('[chat] failed to set thread summary', {
            threadId: thread.id,
            message: error instanceof Error ? error.message : String(error)
          });
        }
      }
      return message;
    }
  };
}
