// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

export interface StreamRegistry {
  /** Returns false when a session for the same user message is already running. */
  claim(threadId: string, userMessageId: string): boolean;
  release(threadId: string, userMessageId: string): void;
}

function key(threadId: string, userMessageId: string): string {
  return `${threadId}::${userMessageId}`;
}

export function createStreamRegistry(): StreamRegistry {
  const active = new Set<string>();
  return {
    claim(threadId, userMessageId) {
      const mapKey = key(threadId, userMessageId);
      if (active.has(mapKey)) {
        return false;
      }
      active.add(mapKey);
      return true;
    },
    release(threadId, userMessageId) {
      active.delete(key(threadId, userMessageId));
    }
  };
}
