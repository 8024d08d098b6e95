// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

export type ChatRole = 'user' | 'assistant';

export interface ChatThread {
  id: string;
  graphId: string;
  userId: string;
  summary: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ChatMessage {
  id: string;
  threadId: string;
  role: ChatRole;
  content: string;
  createdAt: string;
}

export interface ChatMessagesPage {
  messages: ChatMessage[];
  hasMore: boolean;
}

export type StreamEventName = 'chunk' | 'done' | 'error';

export interface ChunkEventPayload {
  content: string;
}

// `content` carries the assistant message id.
export interface DoneEventPayload {
  content: string;
}

export interface ErrorEventPayload {
  error: string;
}
