// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { ChatMessage } from '@/src/shared/chat';
import type { MessageStore } from '@/src/server/chatStore';

export interface PromptMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatContext {
  systemPrompt: string;
  messages: PromptMessage[];
}

export interface RetrievalRequest {
  graphId: string;
  threadId: string;
  query: string;
  /** Aborted when the request's deadline passes. */
  signal?: AbortSignal;
}

/** Supplies grounding passages from the graph's knowledge base. */
export interface RetrievalProvider {
  retrieve(request: RetrievalRequest): Promise<string[]>;
}

export const noopRetrieval: RetrievalProvider = {
  retrieve: async () => []
};

export interface ContextOptions {
  historyLimit: number;
  tokenLimit?: number;
}

export interface ContextBuilder {
  build(input: { graphId: string; userMessage: ChatMessage; signal?: AbortSignal }): Promise<ChatContext>;
}

const DEFAULT_TOKEN_LIMIT = 8000;
const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function createContextBuilder(deps: {
  messages: Pick<MessageStore, 'listRecentMessages'>;
  retrieval?: RetrievalProvider;
  options: ContextOptions;
}): ContextBuilder {
  const retrieval = deps.retrieval ?? noopRetrieval;
  return {
    async build({ graphId, userMessage, signal }) {
      const [history, passages] = await Promise.all([
        deps.messages.listRecentMessages(userMessage.threadId, deps.options.historyLimit + 1),
        retrieval.retrieve({ graphId, threadId: userMessage.threadId, query: userMessage.content, signal })
      ]);
      return buildChatContext({
        history: history.filter((message) => message.id !== userMessage.id),
        userMessage,
        passages,
        historyLimit: deps.options.historyLimit,
        tokenLimit: deps.options.tokenLimit ?? DEFAULT_TOKEN_LIMIT
      });
    }
  };
}

/**
 * Keeps the newest history that fits the token budget; the system prompt and the
 * user's question are always included.
 */
export function buildChatContext(input: {
  history: ChatMessage[];
  userMessage: ChatMessage;
  passages: string[];
  historyLimit: number;
  tokenLimit: number;
}): ChatContext {
  const systemPrompt = buildSystemPrompt(input.passages);
  let tokenBudget =
    input.tokenLimit - estimateTokens(systemPrompt) - estimateTokens(input.userMessage.content);

  const kept: PromptMessage[] = [];
  for (const message of input.history.slice(-input.historyLimit).reverse()) {
    const cost = estimateTokens(message.content);
    if (tokenBudget - cost < 0) {
      break;
    }
    tokenBudget -= cost;
    kept.push({ role: message.role, content: message.content });
  }

  return {
    systemPrompt,
    messages: [
      { role: 'system', content: systemPrompt },
      ...kept.reverse(),
      { role: 'user', content: input.userMessage.content }
    ]
  };
}

function buildSystemPrompt(passages: string[]): string {
  const lines = ["You answer questions about the documents in the user's knowledge graph."];
  if (passages.length > 0) {
    lines.push(
      'Ground every answer in the passages below and cite them by number. If they do not cover the question, say so plainly.',
      'Be concise and quote document wording where it matters.',
      '---',
      ...passages.map((passage, index) => `[${index + 1}] ${passage.trim()}`),
      '---'
    );
  } else {
    lines.push(
      'No document passages are available for this question.',
      'Answer from the conversation and general knowledge, and say when an answer is not backed by the graph documents.',
      'Be concise.'
    );
  }
  return lines.join('\n');
}
