import { createHash, randomUUID } from 'crypto';
import { and, asc, desc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { InboxDatabase } from '../db';
import {
  messages,
  threads,
  type MessageDirection,
  type MessageRow,
  type ThreadRow,
  type ThreadStatus,
} from '../db/schema';
import { NotFoundError, ValidationError } from '../errors';
import { reportError } from '../observability/reportError';
import { normalizeTimestamp } from '../../src/shared/time';
import { computeSla, type SlaResult } from '../../src/shared/sla';
import { formatIssues } from '../validation';
import { ImportRecordSchema } from './validation';

export type Message = {
  id: string;
  threadId: string;
  senderId: string;
  platform: string;
  direction: MessageDirection;
  body: string;
  language: string;
  receivedAt: string;
  rawPayload: unknown;
};

export type Thread = ThreadRow;

export type ThreadWithMessages = Thread & {
  messages: Message[];
};

export type ThreadSummary = Thread & {
  messageCount: number;
  lastMessagePreview: string | null;
  sla: SlaResult;
};

export type ImportRecordError = {
  index: number;
  code: 'VALIDATION_FAILED' | 'STORE_FAILED';
  message: string;
  issues: string[];
};

export type ImportResult = {
  messagesInserted: number;
  threadsAffected: number;
  threadIds: string[];
  errors: ImportRecordError[];
};

export type ImportOptions = {
  defaultLanguage?: string;
};

type NewMessage = {
  platform: string;
  senderId: string;
  senderName: string | null;
  direction: MessageDirection;
  body: string;
  language: string;
  receivedAt: string;
  rawPayload: string | null;
};

const PREVIEW_LENGTH = 80;

export function messageFingerprint(input: {
  platform: string;
  senderId: string;
  receivedAt: string;
  body: string;
}): string {
  return createHash('sha256')
    .update(
      JSON.stringify([
        input.platform,
        input.senderId,
        input.receivedAt,
        input.body,
      ]),
    )
    .digest('hex');
}

function parseRawPayload(value: string | null): unknown {
  if (value === null) return null;
  try {
    return JSON.parse(value) as unknown;
  } catch {
    return value;
  }
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    threadId: row.threadId,
    senderId: row.senderId,
    platform: row.platform,
    direction: row.direction,
    body: row.body,
    language: row.language,
    receivedAt: row.receivedAt,
    rawPayload: parseRawPayload(row.rawPayload),
  };
}

/**
 * Resolves (or creates) the thread for the message's platform and sender,
 * inserts the message and moves `last_message_at` forward, all inside one
 * immediate transaction. Returns `inserted: false` for a duplicate.
 */
function storeMessage(
  db: InboxDatabase,
  input: NewMessage,
): { threadId: string; messageId: string | null; inserted: boolean } {
  return db.transaction(
    (tx) => {
      tx.insert(threads)
        .values({
          id: randomUUID(),
          platform: input.platform,
          senderId: input.senderId,
          title: input.senderName,
          status: 'open',
          createdAt: input.receivedAt,
          lastMessageAt: input.receivedAt,
        })
        .onConflictDoNothing({ target: [threads.platform, threads.senderId] })
        .run();

      const thread = tx
        .select({ id: threads.id })
        .from(threads)
        .where(
          and(
            eq(threads.platform, input.platform),
            eq(threads.senderId, input.senderId),
          ),
        )
        .get();
      if (!thread) {
        throw new Error(
          `Thread for ${input.platform}/${input.senderId} missing after upsert`,
        );
      }

      const messageId = randomUUID();
      const result = tx
        .insert(messages)
        .values({
          id: messageId,
          threadId: thread.id,
          senderId: input.senderId,
          platform: input.platform,
          direction: input.direction,
          body: input.body,
          language: input.language,
          receivedAt: input.receivedAt,
          rawPayload: input.rawPayload,
          fingerprint: messageFingerprint(input),
        })
        .onConflictDoNothing({ target: messages.fingerprint })
        .run();

      if (result.changes === 0) {
        return { threadId: thread.id, messageId: null, inserted: false };
      }

      const update: {
        lastMessageAt: SQL;
        createdAt: SQL;
        title?: SQL;
        status?: ThreadStatus;
      } = {
        lastMessageAt: sql`max(${threads.lastMessageAt}, ${input.receivedAt})`,
        createdAt: sql`min(${threads.createdAt}, ${input.receivedAt})`,
      };
      if (input.senderName) {
        update.title = sql`coalesce(${threads.title}, ${input.senderName})`;
      }
      if (input.direction === 'in') {
        update.status = 'open';
      }
      tx.update(threads).set(update).where(eq(threads.id, thread.id)).run();

      return { threadId: thread.id, messageId, inserted: true };
    },
    { behavior: 'immediate' },
  );
}

export function importMessages(
  db: InboxDatabase,
  batch: unknown[],
  options: ImportOptions = {},
): ImportResult {
  const defaultLanguage = options.defaultLanguage ?? 'en';
  const errors: ImportRecordError[] = [];
  const affected = new Set<string>();
  let messagesInserted = 0;

  batch.forEach((raw, index) => {
    const parsed = ImportRecordSchema.safeParse(raw);
    let failure: ImportRecordError | null = null;

    if (!parsed.success) {
      const error = new ValidationError(
        `Record ${index} is invalid`,
        formatIssues(parsed.error),
      );
      failure = {
        index,
        code: error.code,
        message: error.message,
        issues: error.issues,
      };
    } else {
      const record = parsed.data;
      const receivedAt = normalizeTimestamp(record.received_at);
      if (!receivedAt) {
        failure = {
          index,
          code: 'VALIDATION_FAILED',
          message: `Record ${index} is invalid`,
          issues: [`received_at: unreadable timestamp "${record.received_at}"`],
        };
      } else {
        try {
          const stored = storeMessage(db, {
            platform: record.platform,
            senderId: record.sender_id,
            senderName: record.sender_name || null,
            direction: record.direction,
            body: record.body,
            language: record.language || defaultLanguage,
            receivedAt,
            rawPayload:
              record.raw_payload === undefined || record.raw_payload === null
                ? null
                : JSON.stringify(record.raw_payload),
          });
          if (stored.inserted) {
            messagesInserted += 1;
            affected.add(stored.threadId);
          }
        } catch (error) {
          failure = {
            index,
            code: 'STORE_FAILED',
            message:
              error instanceof Error ? error.message : 'Unknown store error',
            issues: [],
          };
        }
      }
    }

    if (failure) {
      errors.push(failure);
      reportError({
        errorKey: failure.code,
        kind: 'import_record',
        route: 'importMessages',
        severity: failure.code === 'STORE_FAILED' ? 'error' : 'warn',
        message: failure.message,
        details: { index, issues: failure.issues },
      });
    }
  });

  console.info(
    `Imported ${messagesInserted} messages into ${affected.size} threads (${errors.length} rejected)`,
  );

  return {
    messagesInserted,
    threadsAffected: affected.size,
    threadIds: [...affected],
    errors,
  };
}

function selectThread(db: InboxDatabase, id: string): Thread {
  const thread = db.select().from(threads).where(eq(threads.id, id)).get();
  if (!thread) {
    throw new NotFoundError('Thread', id);
  }
  return thread;
}

function selectThreadMessages(db: InboxDatabase, threadId: string): Message[] {
  return db
    .select()
    .from(messages)
    .where(eq(messages.threadId, threadId))
    .orderBy(asc(messages.receivedAt), sql`rowid`)
    .all()
    .map(toMessage);
}

export function getThread(db: InboxDatabase, id: string): ThreadWithMessages {
  const thread = selectThread(db, id);
  return { ...thread, messages: selectThreadMessages(db, id) };
}

export function listThreads(
  db: InboxDatabase,
  filters: { platform?: string; status?: ThreadStatus; now?: Date } = {},
): ThreadSummary[] {
  const conditions: SQL[] = [];
  if (filters.platform) {
    conditions.push(eq(threads.platform, filters.platform.trim().toLowerCase()));
  }
  if (filters.status) {
    conditions.push(eq(threads.status, filters.status));
  }

  const rows = db
    .select()
    .from(threads)
    .where(conditions.length ? and(...conditions) : undefined)
    .orderBy(desc(threads.lastMessageAt), asc(threads.id))
    .all();
  if (!rows.length) {
    return [];
  }

  const messageRows = db
    .select({
      threadId: messages.threadId,
      direction: messages.direction,
      body: messages.body,
      receivedAt: messages.receivedAt,
    })
    .from(messages)
    .where(
      inArray(
        messages.threadId,
        rows.map((row) => row.id),
      ),
    )
    .orderBy(asc(messages.receivedAt), sql`rowid`)
    .all();

  const byThread = new Map<string, typeof messageRows>();
  for (const row of messageRows) {
    const list = byThread.get(row.threadId) ?? [];
    list.push(row);
    byThread.set(row.threadId, list);
  }

  const now = filters.now ?? new Date();
  return rows.map((thread) => {
    const threadMessages = byThread.get(thread.id) ?? [];
    const last = threadMessages[threadMessages.length - 1];
    return {
      ...thread,
      messageCount: threadMessages.length,
      lastMessagePreview: last ? last.body.slice(0, PREVIEW_LENGTH) : null,
      sla: computeSla(threadMessages, now),
    };
  });
}

export function getThreadSla(
  db: InboxDatabase,
  id: string,
  now: Date = new Date(),
): SlaResult {
  selectThread(db, id);
  return computeSla(selectThreadMessages(db, id), now);
}

export function setThreadStatus(
  db: InboxDatabase,
  id: string,
  status: ThreadStatus,
): Thread {
  const updated = db
    .update(threads)
    .set({ status })
    .where(eq(threads.id, id))
    .returning()
    .get();
  if (!updated) {
    throw new NotFoundError('Thread', id);
  }
  return updated;
}

/**
 * Records a reply sent by the operator. Goes through the same transactional
 * path as import so the thread's SLA resets immediately.
 */
export function appendOutbound(
  db: InboxDatabase,
  threadId: string,
  body: string,
  options: { now?: Date; language?: string } = {},
): Message {
  if (!body.trim()) {
    throw new ValidationError('Reply body is empty', ['body: body is required']);
  }
  const thread = selectThread(db, threadId);
  const receivedAt = normalizeTimestamp(options.now ?? new Date());
  if (!receivedAt) {
    throw new ValidationError('Invalid reply timestamp');
  }
  const language =
    options.language ??
    db
      .select({ language: messages.language })
      .from(messages)
      .where(eq(messages.threadId, threadId))
      .orderBy(desc(messages.receivedAt))
      .get()?.language ??
    'en';

  const stored = storeMessage(db, {
    platform: thread.platform,
    senderId: thread.senderId,
    senderName: null,
    direction: 'out',
    body,
    language,
    receivedAt,
    rawPayload: null,
  });
  const fingerprint = messageFingerprint({
    platform: thread.platform,
    senderId: thread.senderId,
    receivedAt,
    body,
  });
  const row = db
    .select()
    .from(messages)
    .where(eq(messages.fingerprint, fingerprint))
    .get();
  if (!row || row.threadId !== stored.threadId) {
    throw new Error(`Outbound message for thread ${threadId} was not stored`);
  }
  return toMessage(row);
}
