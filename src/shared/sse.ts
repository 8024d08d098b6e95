// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { StreamEventName } from '@/src/shared/chat';

const encoder = new TextEncoder();

export function formatSseEvent(event: StreamEventName, payload: Record<string, string>): string {
  return `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;
}

export function encodeSseEvent(event: StreamEventName, payload: Record<string, string>): Uint8Array {
  return encoder.encode(formatSseEvent(event, payload));
}

export interface SseFrame {
  event: string;
  data: string;
}

export function parseSseFrame(block: string): SseFrame | null {
  let event = 'message';
  const data: string[] = [];
  for (const line of block.split('\n')) {
    if (!line || line.startsWith(':')) continue;
    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    if (field === 'event') {
      event = value;
    } else if (field === 'data') {
      data.push(value);
    }
  }
  if (data.length === 0) return null;
  return { event, data: data.join('\n') };
}

export interface SseStreamResult {
  messageId: string | null;
  errorMessage: string | null;
}

interface SseStreamOptions {
  onChunk?: (content: string) => void | Promise<void>;
  onDone?: (messageId: string) => void | Promise<void>;
  onError?: (message: string) => void | Promise<void>;
  defaultErrorMessage?: string;
}

function readField(data: string, field: 'content' | 'error'): string | null {
  try {
    const parsed: unknown = JSON.parse(data);
    if (parsed && typeof parsed === 'object' && field in parsed) {
      const value: unknown = Reflect.get(parsed, field);
      return typeof value === 'string' ? value : null;
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Reads a chat stream until its terminal event. Frames after `done` or `error`
 * are ignored; a stream that ends without either leaves both result fields null.
 */
export async function consumeSseStream(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  options: SseStreamOptions = {}
): Promise<SseStreamResult> {
  const decoder = new TextDecoder();
  let buffer = '';
  const result: SseStreamResult = { messageId: null, errorMessage: null };

  // Returns false once a terminal frame was handled.
  const handleFrame = async (frame: SseFrame): Promise<boolean> => {
    if (frame.event === 'chunk') {
      const content = readField(frame.data, 'content');
      if (content !== null) {
        await options.onChunk?.(content);
      }
      return true;
    }
    if (frame.event === 'done') {
      result.messageId = readField(frame.data, 'content') ?? '';
      await options.onDone?.(result.messageId);
      return false;
    }
    if (frame.event === 'error') {
      const message = readField(frame.data, 'error')?.trim();
      result.errorMessage = message || (options.defaultErrorMessage ?? 'Request failed');
      await options.onError?.(result.errorMessage);
      return false;
    }
    return true;
  };

  const handleBlocks = async (blocks: string[]): Promise<boolean> => {
    for (const block of blocks) {
      const frame = parseSseFrame(block);
      if (!frame) continue;
      const ok = await handleFrame(frame);
      if (!ok) return false;
    }
    return true;
  };

  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true }).replace(/\r\n/g, '\n');
    const blocks = buffer.split('\n\n');
    buffer = blocks.pop() ?? '';
    const ok = await handleBlocks(blocks);
    if (!ok) {
      await reader.cancel().catch(() => undefined);
      return result;
    }
  }

  const rest = buffer + decoder.decode();
  if (rest.trim()) {
    await handleBlocks(rest.split('\n\n'));
  }
  return result;
}
