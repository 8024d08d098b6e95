// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { CHAT_LIMITS } from '@/src/shared/chatLimits';

const DEFAULT_GENERATION_TIMEOUT_MS = 120_000;
const DEFAULT_HISTORY_LIMIT = 40;

export interface ChatConfig {
  generationTimeoutMs: number;
  persistGraceMs: number;
  rateLimitMessages: number;
  rateLimitWindowMs: number;
  historyLimit: number;
}

function parsePositiveInt(raw: string | undefined, fallback: number, min = 1): number {
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.max(min, Math.round(parsed));
}

export function getChatConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
  const generationTimeoutMs = parsePositiveInt(env.CHAT_GENERATION_TIMEOUT_MS, DEFAULT_GENERATION_TIMEOUT_MS, 1000);
  return {
    generationTimeoutMs,
    // Background persistence after a disconnect gets the same bound as generation.
    persistGraceMs: parsePositiveInt(env.CHAT_PERSIST_GRACE_MS, generationTimeoutMs, 1000),
    rateLimitMessages: parsePositiveInt(env.CHAT_RATE_LIMIT_MESSAGES, CHAT_LIMITS.rateLimitMessages),
    rateLimitWindowMs: parsePositiveInt(env.CHAT_RATE_LIMIT_WINDOW_MS, CHAT_LIMITS.rateLimitWindowMs, 1000),
    historyLimit: parsePositiveInt(env.CHAT_HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT)
  };
}
