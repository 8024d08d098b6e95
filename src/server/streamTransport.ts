// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { StreamEventName } from '@/src/shared/chat';
import { encodeSseEvent } from '@/src/shared/sse';
import type { GenerationSession } from '@/src/server/orchestrator';

export type StreamState = 'open' | 'streaming' | 'done' | 'failed' | 'abandoned';

export type TerminalStreamState = Extract<StreamState, 'done' | 'failed' | 'abandoned'>;

export interface StreamSummary {
  state: TerminalStreamState;
  fragmentsRelayed: number;
}

export interface SseStreamOptions {
  session: GenerationSession;
  requestId: string;
  /** The request's abort signal; fires when the client goes away. */
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
  onSettled?: (summary: StreamSummary) => void;
}

const DISCONNECTED = Symbol('disconnected');

function untilDisconnected<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | typeof DISCONNECTED> {
  if (signal.aborted) {
    return Promise.resolve(DISCONNECTED);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(DISCONNECTED);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const;

/**
 * Relays one generation session as server-sent events: `chunk` per fragment in
 * order, then exactly one `done` or `error`. The verdict always comes from the
 * session's completion value, never from the fragment channel closing. When the
 * client disconnects nothing more is written and the session keeps running.
 */
export function createSseStreamResponse(options: SseStreamOptions): Response {
  const { session, requestId } = options;
  const logContext = { requestId, ...options.logContext };
  const disconnect = new AbortController();
  const onRequestAbort = () => disconnect.abort();
  options.signal?.addEventListener('abort', onRequestAbort, { once: true });
  if (options.signal?.aborted) {
    disconnect.abort();
  }

  let state: StreamState = 'open';
  let fragmentsRelayed = 0;
  let bodyCancelled = false;

  const settle = (next: TerminalStreamState) => {
    state = next;
    options.signal?.removeEventListener('abort', onRequestAbort);
    options.onSettled?.({ state: next, fragmentsRelayed });
  };

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const write = (event: StreamEventName, payload: Record<string, string>): boolean => {
        if (disconnect.signal.aborted) return false;
        try {
          controller.enqueue(encodeSseEvent(event, payload));
          return true;
        } catch (error) {
          console.warn('[stream] write failed', { ...logContext, event, message: String(error) });
          bodyCancelled = true;
          disconnect.abort();
          return false;
        }
      };

      const abandon = () => {
        console.info('[stream] client disconnected', { ...logContext, state, fragmentsRelayed });
        settle('abandoned');
        if (!bodyCancelled) {
          controller.close();
        }
      };

      try {
        while (true) {
          const step = await untilDisconnected(session.fragments.next(), disconnect.signal);
          if (step === DISCONNECTED) return abandon();
          if (step.done) break;
          if (!write('chunk', { content: step.value })) return abandon();
          fragmentsRelayed += 1;
          state = 'streaming';
        }

        // The channel is closed; the verdict may not have been published yet.
        const outcome = await untilDisconnected(session.completion, disconnect.signal);
        if (outcome === DISCONNECTED) return abandon();

        if (outcome.status === 'done') {
          if (!write('done', { content: outcome.messageId })) return abandon();
          console.info('[stream] complete', {
            ...logContext,
            messageId: outcome.messageId,
            fragmentsRelayed,
            persisted: outcome.persisted
          });
          settle('done');
        } else {
          if (!write('error', { error: outcome.error.message })) return abandon();
          console.warn('[stream] failed', { ...logContext, code: outcome.error.code, message: outcome.error.message });
          settle('failed');
        }
        controller.close();
      } catch (error) {
        // Only reachable through a broken channel; completion never rejects.
        console.error('[stream] relay crashed', { ...logContext, state, message: String(error) });
        if (write('error', { error: 'Failed to generate response' })) {
          settle('failed');
          controller.close();
        } else {
          abandon();
        }
      }
    },
    cancel() {
      bodyCancelled = true;
      disconnect.abort();
    }
  });

  return new Response(stream, {
    headers: { ...SSE_HEADERS, 'x-request-id': requestId }
  });
}
