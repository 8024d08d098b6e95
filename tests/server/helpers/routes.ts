import type { ChatConfig } from '@/src/server/chatConfig';
import type { RetrievalProvider } from '@/src/server/context';
import type { CompletionFactory } from '@/src/server/orchestrator';
import { buildChatRoutes } from '@/src/server/services';
import { unauthorized } from '@/src/server/http';
import type { InMemoryChatStore } from './inMemoryChatStore';

export const GRAPH_ID = '11111111-1111-4111-8111-111111111111';
export const THREAD_ID = '22222222-2222-4222-8222-222222222222';
export const USER_MESSAGE_ID = '33333333-3333-4333-8333-333333333333';
export const OTHER_GRAPH_ID = '44444444-4444-4444-8444-444444444444';
export const USER_ID = 'user-1';

export const baseUrl = `http://localhost/api/graphs/${GRAPH_ID}/chat`;

export const testConfig: ChatConfig = {
  generationTimeoutMs: 1000,
  persistGraceMs: 1000,
  rateLimitMessages: 2,
  rateLimitWindowMs: 60_000,
  historyLimit: 10
};

export function seedConversation(store: InMemoryChatStore) {
  store.addMember(GRAPH_ID, USER_ID);
  store.seedThread({ id: THREAD_ID, graphId: GRAPH_ID, userId: USER_ID });
  store.seedMessage({ id: USER_MESSAGE_ID, threadId: THREAD_ID, role: 'user', content: 'What links these documents?' });
}

export function createTestRoutes(
  store: InMemoryChatStore,
  completions: CompletionFactory,
  options: { signedIn?: boolean; config?: Partial<ChatConfig>; retrieval?: RetrievalProvider } = {}
) {
  return buildChatRoutes({
    store,
    completions,
    retrieval: options.retrieval,
    config: { ...testConfig, ...options.config },
    authenticate: async () => {
      if (options.signedIn === false) {
        throw unauthorized('Sign in required');
      }
      return { id: USER_ID, email: 'user@example.com' };
    }
  });
}

export function streamRequest(params: { threadId?: string; userMessageId?: string } = {}, init?: RequestInit) {
  const search = new URLSearchParams();
  search.set('threadId', params.threadId ?? THREAD_ID);
  search.set('userMessageId', params.userMessageId ?? USER_MESSAGE_ID);
  return new Request(`${baseUrl}/stream?${search.toString()}`, init);
}
