// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

export const CHAT_LIMITS = {
  messageMaxChars: 4000,
  summaryMaxChars: 100,
  messagesPageSize: 50,
  rateLimitMessages: 20,
  rateLimitWindowMs: 60_000
} as const;
