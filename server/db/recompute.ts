import { eq } from 'drizzle-orm';
import type { InboxDatabase } from './index';
import { messages, threads } from './schema';

/**
 * Rebuilds `last_message_at` and `created_at` on every thread from its
 * stored messages. Threads without messages keep their current values.
 */
export function recomputeThreadStats(db: InboxDatabase): { updated: number } {
  const threadRows = db
    .select({
      id: threads.id,
      createdAt: threads.createdAt,
      lastMessageAt: threads.lastMessageAt,
    })
    .from(threads)
    .all();

  const messageRows = db
    .select({
      threadId: messages.threadId,
      receivedAt: messages.receivedAt,
    })
    .from(messages)
    .all();

  const stats = new Map<string, { first: string; last: string }>();
  for (const row of messageRows) {
    const entry = stats.get(row.threadId);
    if (!entry) {
      stats.set(row.threadId, { first: row.receivedAt, last: row.receivedAt });
      continue;
    }
    if (row.receivedAt < entry.first) {
      entry.first = row.receivedAt;
    }
    if (row.receivedAt > entry.last) {
      entry.last = row.receivedAt;
    }
  }

  let updated = 0;
  db.transaction((tx) => {
    for (const thread of threadRows) {
      const entry = stats.get(thread.id);
      if (
        !entry ||
        (entry.first === thread.createdAt && entry.last === thread.lastMessageAt)
      ) {
        continue;
      }
      tx.update(threads)
        .set({ createdAt: entry.first, lastMessageAt: entry.last })
        .where(eq(threads.id, thread.id))
        .run();
      updated += 1;
    }
  });

  return { updated };
}
