// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { CompletionSource } from '@/src/server/llm';

export type GenerationErrorCode = 'generation_failed' | 'generation_timeout' | 'empty_response' | 'invalid_message';

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.code = code;
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(timeoutMs: number) {
    super('generation_timeout', `Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

export interface GenerationResult {
  fragmentsEmitted: number;
  error: GenerationError | null;
  /** Terminal error the source raised after output had already been emitted. */
  ignoredError: Error | null;
}

export interface RunGenerationOptions {
  timeoutMs: number;
  /** Request-wide deadline; aborting it ends the generation like the timeout does. */
  signal?: AbortSignal;
  onFragment: (fragment: string) => void;
  logContext?: Record<string, unknown>;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Runs `task` unless `signal` has fired; rejects with the abort reason if it fires first. */
export function raceAbort<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    void task().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      }
    );
  });
}

/**
 * Drives one completion to its end and reports an unambiguous verdict.
 *
 * Upstream streams raise from their final pull both on real failures and on an
 * ordinary end of stream, so a terminal error only counts as a failure when no
 * fragment was emitted before it. The timeout aborts the source and goes
 * through the same rule.
 */
export async function runGeneration(open: CompletionSource, options: RunGenerationOptions): Promise<GenerationResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new GenerationTimeoutError(options.timeoutMs)), options.timeoutMs);
  const outer = options.signal;
  const forwardAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    forwardAbort();
  } else {
    outer?.addEventListener('abort', forwardAbort, { once: true });
  }
  let fragmentsEmitted = 0;
  let terminal: Error | null = null;
  let iterator: AsyncIterator<string> | null = null;

  try {
    const source = open(controller.signal)[Symbol.asyncIterator]();
    iterator = source;
    while (true) {
      const step = await raceAbort(() => source.next(), controller.signal);
      if (step.done) break;
      if (!step.value) continue;
      fragmentsEmitted += 1;
      options.onFragment(step.value);
    }
  } catch (error) {
    terminal = controller.signal.aborted ? toError(controller.signal.reason) : toError(error);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', forwardAbort);
  }

  if (terminal && iterator?.return) {
    // Release the source's resources; it may still be parked on the aborted request.
    iterator.return().catch((error: unknown) => {
      console.warn('[generation] source cleanup failed', { ...options.logContext, message: toError(error).message });
    });
  }

  if (terminal && fragmentsEmitted > 0) {
    console.warn('[generation] terminal error after output, treating as complete', {
      ...options.logContext,
      fragmentsEmitted,
      message: terminal.message
    });
    return { fragmentsEmitted, error: null, ignoredError: terminal };
  }

  if (terminal) {
    const error =
      terminal instanceof GenerationError ? terminal : new GenerationError('generation_failed', terminal.message, { cause: terminal });
    console.error('[generation] failed without output', { ...options.logContext, code: error.code, message: error.message });
    return { fragmentsEmitted: 0, error, ignoredError: null };
  }

  if (fragmentsEmitted === 0) {
    console.error('[generation] empty response', { ...options.logContext });
    return {
      fragmentsEmitted: 0,
      error: new GenerationError('empty_response', 'LLM returned empty response'),
      ignoredError: null
    };
  }

  return { fragmentsEmitted, error: null, ignoredError: null };
}
