// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { z } from 'zod';
import { CHAT_LIMITS } from '@/src/shared/chatLimits';

// Length and emptiness are checked by the chat guard so they map to its failure kinds.
export const sendMessageSchema = z.object({
  content: z.string()
});

export const streamQuerySchema = z.object({
  threadId: z.string().uuid(),
  userMessageId: z.string().uuid()
});

export const messagesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().catch(CHAT_LIMITS.messagesPageSize),
  offset: z.coerce.number().int().nonnegative().catch(0)
});

export const routeIdSchema = z.string().uuid();

export type SendMessageInput = z.infer<typeof sendMessageSchema>;
export type StreamQueryInput = z.infer<typeof streamQuerySchema>;
export type MessagesQueryInput = z.infer<typeof messagesQuerySchema>;
