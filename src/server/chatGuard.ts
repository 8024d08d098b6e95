// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import type { ChatThread } from '@/src/shared/chat';
import { CHAT_LIMITS } from '@/src/shared/chatLimits';
import type { MembershipStore, ThreadStore } from '@/src/server/chatStore';
import { ApiError, badRequest, forbidden, notFound, tooManyRequests } from '@/src/server/http';
import type { SlidingWindowRateLimiter } from '@/src/server/rateLimiter';

export type GuardFailureKind =
  | 'NotMember'
  | 'ThreadNotFound'
  | 'ThreadGraphMismatch'
  | 'ContentTooLong'
  | 'ContentEmpty'
  | 'RateLimited';

export type AuthorizationResult =
  | { ok: true; thread: ChatThread }
  | { ok: false; kind: GuardFailureKind; message: string };

export interface ThreadAccessInput {
  threadId: string;
  graphId: string;
  userId: string;
}

export interface GuardCheckInput extends ThreadAccessInput {
  content: string;
}

interface ChatGuardDeps {
  threads: Pick<ThreadStore, 'getThread'>;
  members: MembershipStore;
  rateLimiter: SlidingWindowRateLimiter;
  maxContentChars?: number;
}

function fail(kind: GuardFailureKind, message: string): AuthorizationResult {
  return { ok: false, kind, message };
}

export class ChatGuard {
  private readonly maxContentChars: number;

  constructor(private readonly deps: ChatGuardDeps) {
    this.maxContentChars = deps.maxContentChars ?? CHAT_LIMITS.messageMaxChars;
  }

  /**
   * Full precondition check for a new user message. The rate budget is only
   * consumed once every other check has passed.
   */
  async check(input: GuardCheckInput): Promise<AuthorizationResult> {
    if (!input.content.trim()) {
      return fail('ContentEmpty', 'Message content is required');
    }
    if (input.content.length > this.maxContentChars) {
      return fail('ContentTooLong', `Message content exceeds ${this.maxContentChars} characters`);
    }

    const access = await this.checkThreadAccess(input);
    if (!access.ok) {
      return access;
    }

    if (!this.deps.rateLimiter.allow(input.userId)) {
      const { limit, windowMs } = this.deps.rateLimiter;
      console.warn('[guard] rate limited', {
        userId: input.userId,
        threadId: input.threadId,
        limit,
        windowMs,
        trackedUsers: this.deps.rateLimiter.trackedKeys()
      });
      return fail('RateLimited', `Rate limit exceeded: maximum ${limit} messages per ${Math.round(windowMs / 1000)} seconds`);
    }
    return access;
  }

  async checkThreadAccess(input: ThreadAccessInput): Promise<AuthorizationResult> {
    const thread = await this.deps.threads.getThread(input.threadId);
    if (!thread) {
      return fail('ThreadNotFound', 'Chat thread not found');
    }
    const isMember = await this.deps.members.isGraphMember(thread.graphId, input.userId);
    if (!isMember) {
      return fail('NotMember', "You don't have access to this chat thread");
    }
    if (thread.graphId !== input.graphId) {
      return fail('ThreadGraphMismatch', 'Thread does not belong to this graph');
    }
    return { ok: true, thread };
  }
}

export function guardFailureToApiError(kind: GuardFailureKind, message: string): ApiError {
  switch (kind) {
    case 'NotMember':
      return forbidden(message);
    case 'ThreadNotFound':
      return notFound(message);
    case 'RateLimited':
      return tooManyRequests(message);
    case 'ThreadGraphMismatch':
    case 'ContentTooLong':
    case 'ContentEmpty':
      return badRequest(message, { reason: kind });
  }
}

export function requireAuthorized(result: AuthorizationResult): ChatThread {
  if (!result.ok) {
    throw guardFailureToApiError(result.kind, result.message);
  }
  return result.thread;
}
