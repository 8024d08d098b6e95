// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ChatMessage, ChatThread } from '@/src/shared/chat';
import type { ChatStore } from '@/src/server/chatStore';
import type { QueryFn } from '@/src/store/pg/pool';

const timestamp = z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString());

const threadRowSchema = z
  .object({
    id: z.string(),
    graph_id: z.string(),
    user_id: z.string(),
    summary: z.string().nullable(),
    created_at: timestamp,
    updated_at: timestamp
  })
  .transform(
    (row): ChatThread => ({
      id: row.id,
      graphId: row.graph_id,
      userId: row.user_id,
      summary: row.summary,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    })
  );

const messageRowSchema = z
  .object({
    id: z.string(),
    thread_id: z.string(),
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    created_at: timestamp
  })
  .transform(
    (row): ChatMessage => ({
      id: row.id,
      threadId: row.thread_id,
      role: row.role,
      content: row.content,
      createdAt: row.created_at
    })
  );

const memberRowSchema = z.object({ is_member: z.boolean() });

const THREAD_COLUMNS = 'id, graph_id, user_id, summary, created_at, updated_at';
const MESSAGE_COLUMNS = 'id, thread_id, role, content, created_at';

function firstRow<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  return rows.length > 0 ? schema.parse(rows[0]) : null;
}

export function createPgChatStore(query: QueryFn): ChatStore {
  return {
    async createThread({ graphId, userId }) {
      const { rows } = await query(
        `insert into chat_threads (id, graph_id, user_id) values ($1, $2, $3) returning ${THREAD_COLUMNS};`,
        [uuidv4(), graphId, userId]
      );
      const thread = firstRow(rows, threadRowSchema);
      if (!thread) {
        throw new Error('Thread insert returned no row');
      }
      return thread;
    },

    async getThread(threadId) {
      const { rows } = await query(`select ${THREAD_COLUMNS} from chat_threads where id = $1;`, [threadId]);
      return firstRow(rows, threadRowSchema);
    },

    async listThreadsByGraph(graphId) {
      const { rows } = await query(
        `select ${THREAD_COLUMNS} from chat_threads where graph_id = $1 order by updated_at desc;`,
        [graphId]
      );
      return rows.map((row) => threadRowSchema.parse(row));
    },

    async setThreadSummary(threadId, summary) {
      await query('update chat_threads set summary = $2, updated_at = now() where id = $1;', [threadId, summary]);
    },

    async saveMessage({ id, threadId, role, content }) {
      const { rows } = await query(
        [
          'with inserted as (',
          `  insert into chat_messages (id, thread_id, role, content) values ($1, $2, $3, $4) returning ${MESSAGE_COLUMNS}`,
          '), touched as (',
          '  update chat_threads set updated_at = now() where id = $2',
          ')',
          `select ${MESSAGE_COLUMNS} from inserted;`
        ].join('\n'),
        [id ?? uuidv4(), threadId, role, content]
      );
      const message = firstRow(rows, messageRowSchema);
      if (!message) {
        throw new Error('Message insert returned no row');
      }
      return message;
    },

    async getMessage(threadId, messageId) {
      const { rows } = await query(`select ${MESSAGE_COLUMNS} from chat_messages where thread_id = $1 and id = $2;`, [
        threadId,
        messageId
      ]);
      return firstRow(rows, messageRowSchema);
    },

    async listMessages(threadId, { limit, offset }) {
      const { rows } = await query(
        `select ${MESSAGE_COLUMNS} from chat_messages where thread_id = $1 order by created_at asc, id asc limit $2 offset $3;`,
        [threadId, limit, offset]
      );
      return rows.map((row) => messageRowSchema.parse(row));
    },

    async listRecentMessages(threadId, limit) {
      const { rows } = await query(
        [
          `select ${MESSAGE_COLUMNS} from (`,
          `  select ${MESSAGE_COLUMNS} from chat_messages where thread_id = $1 order by created_at desc, id desc limit $2`,
          ') recent order by created_at asc, id asc;'
        ].join('\n'),
        [threadId, limit]
      );
      return rows.map((row) => messageRowSchema.parse(row));
    },

    async isGraphMember(graphId, userId) {
      const { rows } = await query(
        'select exists(select 1 from graph_memberships where graph_id = $1 and user_id = $2) as is_member;',
        [graphId, userId]
      );
      return firstRow(rows, memberRowSchema)?.is_member ?? false;
    }
  };
}
