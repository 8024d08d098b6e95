// Copyright (c) 2025 Benjamin F. Hall. All rights reserved.

import OpenAI from 'openai';
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type Content,
  type EnhancedGenerateContentResponse,
  type GenerateContentStreamResult
} from '@google/generative-ai';
import type { PromptMessage } from '@/src/server/context';
import { getDefaultProvider, getEnabledProviders, getProviderEnvConfig } from '@/src/server/llmConfig';
import type { LLMProvider } from '@/src/shared/llmProvider';

export type { LLMProvider } from '@/src/shared/llmProvider';

export interface LLMStreamOptions {
  messages: PromptMessage[];
  signal?: AbortSignal;
  provider?: LLMProvider;
  model?: string;
  apiKey?: string | null;
}

/** Opens a fragment stream; the signal aborts the underlying request. */
export type CompletionSource = (signal: AbortSignal) => AsyncIterable<string>;

export function resolveLLMProvider(requested?: LLMProvider): LLMProvider {
  if (requested) {
    const enabled = new Set(getEnabledProviders());
    return enabled.has(requested) ? requested : getDefaultProvider();
  }
  return getDefaultProvider();
}

export async function* streamAssistantCompletion({
  messages,
  signal,
  provider,
  model,
  apiKey
}: LLMStreamOptions): AsyncGenerator<string> {
  const resolvedProvider = provider ?? getDefaultProvider();
  const enabled = new Set(getEnabledProviders());
  if (!enabled.has(resolvedProvider)) {
    throw new Error(`Provider ${resolvedProvider} is not enabled.`);
  }
  const config = getProviderEnvConfig(resolvedProvider);
  const modelName = model ?? config.defaultModel;
  const key = apiKey ?? config.apiKey;

  if (resolvedProvider === 'gemini') {
    yield* streamFromGemini(messages, modelName, key, signal);
    return;
  }

  if (resolvedProvider === 'openai') {
    yield* streamFromOpenAI(messages, modelName, key, signal);
    return;
  }

  yield* streamFromMock(messages, signal);
}

function toOpenAIMessage(message: PromptMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

async function* streamFromOpenAI(
  messages: PromptMessage[],
  model: string,
  apiKey: string | null,
  signal?: AbortSignal
): AsyncGenerator<string> {
  if (!apiKey) {
    throw new Error('Missing OpenAI API key. Set OPENAI_API_KEY to use this provider.');
  }

  const openAIClient = new OpenAI({ apiKey });
  const stream = await openAIClient.chat.completions.create(
    {
      model,
      messages: messages.map(toOpenAIMessage),
      stream: true
    },
    { signal }
  );

  for await (const part of stream) {
    const content = part.choices[0]?.delta?.content;
    if (content) {
      yield content;
    }
  }
}

function sanitizeGeminiErrorMessage(message: string): string {
  // The SDK can echo the request URL, key included, into error messages.
  return message.replace(/([?&]key=)[^&\s]+/gi, '$1[REDACTED]');
}

function toGeminiError(error: unknown, modelName: string): Error {
  if (error instanceof GoogleGenerativeAIFetchError) {
    if (error.status === 405) {
      return new Error(`Gemini model ${modelName} does not support streaming (HTTP 405).`);
    }
    return new Error(sanitizeGeminiErrorMessage(`Gemini request failed: [${error.status ?? ''}] ${error.message}`));
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new Error(sanitizeGeminiErrorMessage(`Gemini response error: ${error.message}`));
  }
  return error instanceof Error ? error : new Error(String(error));
}

export function getGeminiDelta(next: string, previous: string): { delta: string; updated: string } {
  if (!next) return { delta: '', updated: previous };
  if (next.startsWith(previous)) {
    return { delta: next.slice(previous.length), updated: next };
  }
  return { delta: next, updated: previous + next };
}

export function extractGeminiText(response: EnhancedGenerateContentResponse): string {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts
    .map((part) => (typeof part.text === 'string' ? part.text : ''))
    .join('');
}

async function* streamFromGemini(
  messages: PromptMessage[],
  modelName: string,
  apiKey: string | null,
  signal?: AbortSignal
): AsyncGenerator<string> {
  if (!apiKey) {
    throw new Error('Missing Gemini API key. Set GEMINI_API_KEY to use this provider.');
  }

  const geminiClient = new GoogleGenerativeAI(apiKey);
  const systemInstruction = messages
    .filter((message) => message.role === 'system')
    .map((message) => message.content)
    .join('\n\n')
    .trim();
  const contents: Content[] = messages
    .filter((message) => message.role !== 'system')
    .map((message) => ({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: message.content }]
    }));

  const model = geminiClient.getGenerativeModel(
    systemInstruction ? { model: modelName, systemInstruction } : { model: modelName }
  );

  let result: GenerateContentStreamResult;
  try {
    result = await model.generateContentStream({ contents }, { signal });
  } catch (error) {
    throw toGeminiError(error, modelName);
  }

  let lastTextSnapshot = '';
  try {
    for await (const chunk of result.stream) {
      if (signal?.aborted) {
        break;
      }
      const { delta, updated } = getGeminiDelta(extractGeminiText(chunk), lastTextSnapshot);
      lastTextSnapshot = updated;
      if (delta) {
        yield delta;
      }
    }
  } catch (error) {
    throw toGeminiError(error, modelName);
  }
}

async function* streamFromMock(messages: PromptMessage[], signal?: AbortSignal): AsyncGenerator<string> {
  const lastUser = [...messages].reverse().find((msg) => msg.role === 'user');
  const reply = lastUser ? `Echo: ${lastUser.content}` : 'Ready for questions.';
  for (const token of reply.match(/.{1,80}/gs) ?? []) {
    if (signal?.aborted) {
      break;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
    yield token;
  }
}
