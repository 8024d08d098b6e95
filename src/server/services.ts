// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { Pool } from 'pg';
import { requireUser, type Authenticator } from '@/src/server/auth';
import { getChatConfig, type ChatConfig } from '@/src/server/chatConfig';
import { ChatGuard } from '@/src/server/chatGuard';
import { createChatRoutes, type ChatRoutes } from '@/src/server/chatRoutes';
import type { ChatStore } from '@/src/server/chatStore';
import { createChatThreadService } from '@/src/server/chatThreads';
import { createContextBuilder, type RetrievalProvider } from '@/src/server/context';
import { resolveLLMProvider, streamAssistantCompletion } from '@/src/server/llm';
import { ResponseOrchestrator, type CompletionFactory } from '@/src/server/orchestrator';
import { SlidingWindowRateLimiter } from '@/src/server/rateLimiter';
import { createStreamRegistry } from '@/src/server/stream-registry';
import { createPgChatStore } from '@/src/store/pg/chatStore';
import { createPgPool, createPoolQuery, readDatabaseUrl } from '@/src/store/pg/pool';

export interface ChatServiceDeps {
  store: ChatStore;
  completions: CompletionFactory;
  authenticate: Authenticator;
  config: ChatConfig;
  retrieval?: RetrievalProvider;
  now?: () => number;
}

/** Wires the chat pipeline from explicit collaborators. */
export function buildChatRoutes(deps: ChatServiceDeps): ChatRoutes {
  const { store, config } = deps;
  const guard = new ChatGuard({
    threads: store,
    members: store,
    rateLimiter: new SlidingWindowRateLimiter(config.rateLimitMessages, config.rateLimitWindowMs, deps.now)
  });
  const orchestrator = new ResponseOrchestrator({
    messages: store,
    context: createContextBuilder({
      messages: store,
      retrieval: deps.retrieval,
      options: { historyLimit: config.historyLimit }
    }),
    completions: deps.completions,
    generationTimeoutMs: config.generationTimeoutMs,
    persistGraceMs: config.persistGraceMs
  });

  return createChatRoutes({
    authenticate: deps.authenticate,
    guard,
    threads: createChatThreadService({ store, guard }),
    orchestrator,
    registry: createStreamRegistry()
  });
}

export const llmCompletions: CompletionFactory = (messages) => {
  const provider = resolveLLMProvider();
  return (signal) => streamAssistantCompletion({ messages, signal, provider });
};

interface Services {
  pool: Pool;
  routes: ChatRoutes;
}

let services: Services | null = null;

function createServices(): Services {
  const pool = createPgPool({ connectionString: readDatabaseUrl() });
  const config = getChatConfig();
  console.info('[services] chat pipeline configured', {
    generationTimeoutMs: config.generationTimeoutMs,
    persistGraceMs: config.persistGraceMs,
    rateLimitMessages: config.rateLimitMessages,
    rateLimitWindowMs: config.rateLimitWindowMs,
    historyLimit: config.historyLimit
  });
  const routes = buildChatRoutes({
    store: createPgChatStore(createPoolQuery(pool)),
    completions: llmCompletions,
    authenticate: requireUser,
    config
  });
  return { pool, routes };
}

/** Process-wide composition root; built on first use by the route modules. */
export function getServices(): Services {
  if (!services) {
    services = createServices();
  }
  return services;
}
