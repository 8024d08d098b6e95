// Copyright (c) 2025 Benjamin F. Hall. All rights reserved.

export const LLM_PROVIDERS = ['gemini', 'openai', 'mock'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}
