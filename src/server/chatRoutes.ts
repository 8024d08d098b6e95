// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { v4 as uuidv4 } from 'uuid';
import type { Authenticator } from '@/src/server/auth';
import { requireAuthorized, type ChatGuard } from '@/src/server/chatGuard';
import type { ChatThreadService } from '@/src/server/chatThreads';
import { badRequest, conflict, handleRouteError } from '@/src/server/http';
import type { ResponseOrchestrator } from '@/src/server/orchestrator';
import { messagesQuerySchema, routeIdSchema, sendMessageSchema, streamQuerySchema } from '@/src/server/schemas';
import type { StreamRegistry } from '@/src/server/stream-registry';
import { createSseStreamResponse } from '@/src/server/streamTransport';

export interface GraphRouteContext {
  params: { id: string };
}

export interface ThreadRouteContext {
  params: { id: string; threadId: string };
}

export interface ChatRouteDeps {
  authenticate: Authenticator;
  guard: ChatGuard;
  threads: ChatThreadService;
  orchestrator: ResponseOrchestrator;
  registry: StreamRegistry;
}

export interface ChatRoutes {
  listThreads(request: Request, context: GraphRouteContext): Promise<Response>;
  createThread(request: Request, context: GraphRouteContext): Promise<Response>;
  listMessages(request: Request, context: ThreadRouteContext): Promise<Response>;
  sendMessage(request: Request, context: ThreadRouteContext): Promise<Response>;
  stream(request: Request, context: GraphRouteContext): Promise<Response>;
}

function parseRouteId(value: string, label: string): string {
  const parsed = routeIdSchema.safeParse(value);
  if (!parsed.success) {
    throw badRequest(`Invalid ${label}`);
  }
  return parsed.data;
}

function searchParamsObject(request: Request): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams.entries());
}

export function createChatRoutes(deps: ChatRouteDeps): ChatRoutes {
  const { authenticate, guard, threads, orchestrator, registry } = deps;

  return {
    async listThreads(_request, { params }) {
      try {
        const user = await authenticate();
        const graphId = parseRouteId(params.id, 'graph id');
        const items = await threads.listThreads(graphId, user.id);
        return Response.json({ threads: items });
      } catch (error) {
        return handleRouteError(error);
      }
    },

    async createThread(_request, { params }) {
      try {
        const user = await authenticate();
        const graphId = parseRouteId(params.id, 'graph id');
        const thread = await threads.createThread(graphId, user.id);
        return Response.json({ thread }, { status: 201 });
      } catch (error) {
        return handleRouteError(error);
      }
    },

    async listMessages(request, { params }) {
      try {
        const user = await authenticate();
        const graphId = parseRouteId(params.id, 'graph id');
        const threadId = parseRouteId(params.threadId, 'thread id');
        const { limit, offset } = messagesQuerySchema.parse(searchParamsObject(request));
        const page = await threads.listMessages({ graphId, threadId, userId: user.id }, { limit, offset });
        return Response.json(page);
      } catch (error) {
        return handleRouteError(error);
      }
    },

    async sendMessage(request, { params }) {
      try {
        const user = await authenticate();
        const graphId = parseRouteId(params.id, 'graph id');
        const threadId = parseRouteId(params.threadId, 'thread id');

        const body: unknown = await request.json().catch(() => null);
        const parsed = sendMessageSchema.safeParse(body);
        if (!parsed.success) {
          throw badRequest('Invalid request body', { issues: parsed.error.flatten() });
        }

        const message = await threads.sendUserMessage({ graphId, threadId, userId: user.id, content: parsed.data.content });
        return Response.json({ message }, { status: 201 });
      } catch (error) {
        return handleRouteError(error);
      }
    },

    async stream(request, { params }) {
      const requestId = uuidv4();
      try {
        const user = await authenticate();
        const graphId = parseRouteId(params.id, 'graph id');
        const parsed = streamQuerySchema.safeParse(searchParamsObject(request));
        if (!parsed.success) {
          throw badRequest('threadId and userMessageId query parameters are required', {
            issues: parsed.error.flatten()
          });
        }
        const { threadId, userMessageId } = parsed.data;

        requireAuthorized(await guard.checkThreadAccess({ threadId, graphId, userId: user.id }));

        if (!registry.claim(threadId, userMessageId)) {
          throw conflict('A response is already streaming for this message', { threadId, userMessageId });
        }

        const logContext = { graphId, threadId, userMessageId, userId: user.id };
        console.info('[chat] stream start', { requestId, ...logContext });

        const session = orchestrator.generate({ threadId, userMessageId, graphId, requestId });
        // Held until the orchestrator settles (persistence included), even after a disconnect.
        void session.completion.then((outcome) => {
          registry.release(threadId, userMessageId);
          console.info('[chat] stream settled', { requestId, ...logContext, status: outcome.status });
        });

        return createSseStreamResponse({
          session,
          requestId,
          signal: request.signal,
          logContext,
          onSettled: ({ state, fragmentsRelayed }) => {
            console.info('[chat] stream closed', { requestId, ...logContext, state, fragmentsRelayed });
          }
        });
      } catch (error) {
        return handleRouteError(error, requestId);
      }
    }
  };
}
