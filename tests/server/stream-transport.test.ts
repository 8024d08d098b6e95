// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FragmentChannel } from '@/src/server/channel';
import { GenerationError } from '@/src/server/generation';
import type { GenerationOutcome, GenerationSession } from '@/src/server/orchestrator';
import { createSseStreamResponse } from '@/src/server/streamTransport';
import { deferred, parseEvents } from './helpers/sources';

function createSession() {
  const fragments = new FragmentChannel<string>();
  const completion = deferred<GenerationOutcome>();
  const session: GenerationSession = { fragments, completion: completion.promise };
  return { session, fragments, completion };
}

const decoder = new TextDecoder();

describe('createSseStreamResponse', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('relays chunks in order followed by a single done event', async () => {
    const { session, fragments, completion } = createSession();
    const onSettled = vi.fn();
    const response = createSseStreamResponse({ session, requestId: 'req-1', onSettled });

    fragments.push('Hello');
    fragments.push(' world');
    fragments.close();
    completion.resolve({ status: 'done', messageId: 'assistant-1', content: 'Hello world', fragments: 2, persisted: true });

    expect(response.headers.get('Content-Type')).toBe('text/event-stream; charset=utf-8');
    expect(response.headers.get('Cache-Control')).toBe('no-cache, no-transform');
    expect(response.headers.get('x-request-id')).toBe('req-1');
    expect(await response.text()).toBe(
      'event: chunk\ndata: {"content":"Hello"}\n\n' +
        'event: chunk\ndata: {"content":" world"}\n\n' +
        'event: done\ndata: {"content":"assistant-1"}\n\n'
    );
    expect(onSettled).toHaveBeenCalledWith({ state: 'done', fragmentsRelayed: 2 });
  });

  it('sends only an error event when generation failed without output', async () => {
    const { session, fragments, completion } = createSession();
    const onSettled = vi.fn();
    const response = createSseStreamResponse({ session, requestId: 'req-2', onSettled });

    fragments.close();
    completion.resolve({ status: 'error', error: new GenerationError('generation_failed', 'upstream unavailable') });

    expect(parseEvents(await response.text())).toEqual([{ event: 'error', data: { error: 'upstream unavailable' } }]);
    expect(onSettled).toHaveBeenCalledWith({ state: 'failed', fragmentsRelayed: 0 });
  });

  it('waits for the completion value after the channel closes', async () => {
    const { session, fragments, completion } = createSession();
    const response = createSseStreamResponse({ session, requestId: 'req-3' });
    const body = response.body;
    if (!body) throw new Error('missing body');
    const reader = body.getReader();

    fragments.push('only');
    fragments.close();
    const first = await reader.read();
    expect(decoder.decode(first.value)).toBe('event: chunk\ndata: {"content":"only"}\n\n');

    let settled = false;
    const second = reader.read().then((result) => {
      settled = true;
      return result;
    });
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(settled).toBe(false);

    completion.resolve({ status: 'done', messageId: 'assistant-3', content: 'only', fragments: 1, persisted: true });
    const terminal = await second;
    expect(decoder.decode(terminal.value)).toBe('event: done\ndata: {"content":"assistant-3"}\n\n');
    await expect(reader.read()).resolves.toEqual({ value: undefined, done: true });
  });

  it('stops writing once the client disconnects', async () => {
    const { session, fragments, completion } = createSession();
    const request = new AbortController();
    const onSettled = vi.fn();
    const response = createSseStreamResponse({ session, requestId: 'req-4', signal: request.signal, onSettled });
    const body = response.body;
    if (!body) throw new Error('missing body');
    const reader = body.getReader();

    fragments.push('a');
    const first = await reader.read();
    expect(decoder.decode(first.value)).toBe('event: chunk\ndata: {"content":"a"}\n\n');

    request.abort();
    await expect(reader.read()).resolves.toEqual({ value: undefined, done: true });
    expect(onSettled).toHaveBeenCalledWith({ state: 'abandoned', fragmentsRelayed: 1 });

    fragments.push('b');
    fragments.close();
    completion.resolve({ status: 'done', messageId: 'assistant-4', content: 'ab', fragments: 2, persisted: true });
    await completion.promise;
    expect(onSettled).toHaveBeenCalledTimes(1);
  });

  it('treats a cancelled body as a disconnect', async () => {
    const { session, fragments, completion } = createSession();
    const onSettled = vi.fn();
    const response = createSseStreamResponse({ session, requestId: 'req-5', onSettled });
    const body = response.body;
    if (!body) throw new Error('missing body');
    const reader = body.getReader();

    await reader.cancel();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(onSettled).toHaveBeenCalledWith({ state: 'abandoned', fragmentsRelayed: 0 });

    fragments.close();
    completion.resolve({ status: 'done', messageId: 'assistant-5', content: 'x', fragments: 1, persisted: true });
    await completion.promise;
    expect(onSettled).toHaveBeenCalledTimes(1);
  });
});
