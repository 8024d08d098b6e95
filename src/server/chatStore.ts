// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { ChatMessage, ChatRole, ChatThread } from '@/src/shared/chat';

export interface SaveMessageInput {
  id?: string;
  threadId: string;
  role: ChatRole;
  content: string;
}

export interface ListMessagesOptions {
  limit: number;
  offset: number;
}

export interface ThreadStore {
  createThread(input: { graphId: string; userId: string }): Promise<ChatThread>;
  getThread(threadId: string): Promise<ChatThread | null>;
  listThreadsByGraph(graphId: string): Promise<ChatThread[]>;
  setThreadSummary(threadId: string, summary: string): Promise<void>;
}

export interface MessageStore {
  /** Inserts the row and bumps the thread's updated-at. Returns the message id. */
  saveMessage(input: SaveMessageInput): Promise<ChatMessage>;
  getMessage(threadId: string, messageId: string): Promise<ChatMessage | null>;
  listMessages(threadId: string, options: ListMessagesOptions): Promise<ChatMessage[]>;
  /** Most recent messages in chronological order. */
  listRecentMessages(threadId: string, limit: number): Promise<ChatMessage[]>;
}

export interface MembershipStore {
  isGraphMember(graphId: string, userId: string): Promise<boolean>;
}

export type ChatStore = ThreadStore & MessageStore & MembershipStore;
