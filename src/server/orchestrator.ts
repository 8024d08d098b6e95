// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { v4 as uuidv4 } from 'uuid';
import type { ChatMessage } from '@/src/shared/chat';
import { FragmentChannel } from '@/src/server/channel';
import type { MessageStore } from '@/src/server/chatStore';
import type { ContextBuilder, PromptMessage } from '@/src/server/context';
import { GenerationError, GenerationTimeoutError, raceAbort, runGeneration } from '@/src/server/generation';
import type { CompletionSource } from '@/src/server/llm';

export type GenerationOutcome =
  | { status: 'done'; messageId: string; content: string; fragments: number; persisted: boolean }
  | { status: 'error'; error: GenerationError };

export interface GenerationSession {
  /** Closed by the orchestrator once the adapter has returned, never earlier. */
  fragments: FragmentChannel<string>;
  /** Settles exactly once and never rejects. */
  completion: Promise<GenerationOutcome>;
}

export interface GenerateInput {
  threadId: string;
  userMessageId: string;
  graphId: string;
  requestId: string;
}

export type CompletionFactory = (messages: PromptMessage[]) => CompletionSource;

interface OrchestratorDeps {
  messages: Pick<MessageStore, 'getMessage' | 'saveMessage'>;
  context: ContextBuilder;
  completions: CompletionFactory;
  generationTimeoutMs: number;
  persistGraceMs: number;
}

class PersistTimeoutError extends Error {
  constructor(ms: number) {
    super(`Persisting the assistant message took longer than ${ms}ms`);
    this.name = 'PersistTimeoutError';
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PersistTimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ResponseOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Starts generation detached from the caller and returns at once. The caller
   * drains `fragments` and then awaits `completion`; the two are separate so a
   * closed channel is never mistaken for a verdict.
   */
  generate(input: GenerateInput): GenerationSession {
    const fragments = new FragmentChannel<string>();
    const completion = this.run(input, fragments).catch((error: unknown): GenerationOutcome => {
      fragments.close();
      console.error('[chat] orchestrator crashed', { ...input, message: describe(error) });
      return {
        status: 'error',
        error: new GenerationError('generation_failed', 'Failed to generate response', { cause: error })
      };
    });
    return { fragments, completion };
  }

  private async run(input: GenerateInput, fragments: FragmentChannel<string>): Promise<GenerationOutcome> {
    const logContext = { requestId: input.requestId, threadId: input.threadId, userMessageId: input.userMessageId };
    let content = '';
    let fragmentCount = 0;
    let generationError: GenerationError | null = null;
    let ignoredError: Error | null = null;

    // One deadline for the whole request: loading, context building and the model call.
    const timeoutMs = this.deps.generationTimeoutMs;
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new GenerationTimeoutError(timeoutMs)), timeoutMs);

    try {
      const userMessage = await raceAbort(() => this.loadUserMessage(input), deadline.signal);
      const context = await raceAbort(
        () => this.deps.context.build({ graphId: input.graphId, userMessage, signal: deadline.signal }),
        deadline.signal
      );
      const result = await runGeneration(this.deps.completions(context.messages), {
        timeoutMs,
        signal: deadline.signal,
        logContext,
        onFragment: (fragment) => {
          content += fragment;
          fragments.push(fragment);
        }
      });
      fragmentCount = result.fragmentsEmitted;
      generationError = result.error;
      ignoredError = result.ignoredError;
    } catch (error) {
      generationError =
        error instanceof GenerationError
          ? error
          : new GenerationError('generation_failed', describe(error), { cause: error });
      console.error('[chat] generation setup failed', { ...logContext, code: generationError.code, message: generationError.message });
    } finally {
      clearTimeout(timer);
      fragments.close();
    }

    if (generationError) {
      return { status: 'error', error: generationError };
    }

    const messageId = uuidv4();
    try {
      await withTimeout(
        this.deps.messages.saveMessage({ id: messageId, threadId: input.threadId, role: 'assistant', content }),
        this.deps.persistGraceMs
      );
    } catch (error) {
      // The client already has the content; a failed save must not turn into an error event.
      console.error('[chat] failed to persist assistant message', {
        ...logContext,
        messageId,
        contentLength: content.length,
        message: describe(error)
      });
      return { status: 'done', messageId, content, fragments: fragmentCount, persisted: false };
    }

    console.info('[chat] assistant message persisted', {
      ...logContext,
      messageId,
      fragments: fragmentCount,
      ignoredError: ignoredError?.message ?? null
    });
    return { status: 'done', messageId, content, fragments: fragmentCount, persisted: true };
  }

  private async loadUserMessage(input: GenerateInput): Promise<ChatMessage> {
    const message = await this.deps.messages.getMessage(input.threadId, input.userMessageId);
    if (!message || message.threadId !== input.threadId) {
      throw new GenerationError('invalid_message', 'Message does not belong to thread');
    }
    if (message.role !== 'user') {
      throw new GenerationError('invalid_message', 'Message is not from user');
    }
    return message;
  }
}
