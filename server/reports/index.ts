import { eq } from 'drizzle-orm';
import type { InboxDatabase } from '../db';
import { messages, threads, type MessageDirection } from '../db/schema';
import { computeSla, type SlaStatus } from '../../src/shared/sla';
import {
  formatDateKey,
  startOfMonthUTC,
  startOfWeekUTC,
} from '../../src/shared/time';

export const REPORT_MODES = ['weekly', 'monthly'] as const;

export type ReportMode = (typeof REPORT_MODES)[number];

export type ReportRow = {
  period: string;
  threadsStarted: number;
  inbound: number;
  outbound: number;
};

export type SlaSummary = Record<SlaStatus, number> & { open: number };

function periodKey(timestamp: string, mode: ReportMode): string {
  const date = new Date(timestamp);
  return formatDateKey(
    mode === 'weekly' ? startOfWeekUTC(date) : startOfMonthUTC(date),
  );
}

function rollup(
  threadRows: { createdAt: string }[],
  messageRows: { direction: MessageDirection; receivedAt: string }[],
  mode: ReportMode,
): ReportRow[] {
  const buckets = new Map<string, Omit<ReportRow, 'period'>>();
  const bucketFor = (key: string) => {
    const bucket = buckets.get(key) ?? {
      threadsStarted: 0,
      inbound: 0,
      outbound: 0,
    };
    buckets.set(key, bucket);
    return bucket;
  };

  for (const row of threadRows) {
    bucketFor(periodKey(row.createdAt, mode)).threadsStarted += 1;
  }
  for (const row of messageRows) {
    const bucket = bucketFor(periodKey(row.receivedAt, mode));
    if (row.direction === 'in') {
      bucket.inbound += 1;
    } else {
      bucket.outbound += 1;
    }
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => (a < b ? 1 : -1))
    .map(([period, bucket]) => ({ period, ...bucket }));
}

/**
 * Per-period activity, newest period first. Weeks start on Monday (UTC).
 */
export function buildInboxReport(
  db: InboxDatabase,
  mode: ReportMode,
): ReportRow[] {
  const threadRows = db
    .select({ createdAt: threads.createdAt })
    .from(threads)
    .all();
  const messageRows = db
    .select({
      direction: messages.direction,
      receivedAt: messages.receivedAt,
    })
    .from(messages)
    .all();
  return rollup(threadRows, messageRows, mode);
}

export function buildSlaSummary(
  db: InboxDatabase,
  now: Date = new Date(),
): SlaSummary {
  const rows = db
    .select({
      threadId: messages.threadId,
      direction: messages.direction,
      receivedAt: messages.receivedAt,
    })
    .from(messages)
    .innerJoin(threads, eq(threads.id, messages.threadId))
    .where(eq(threads.status, 'open'))
    .all();

  const byThread = new Map<string, typeof rows>();
  for (const row of rows) {
    const list = byThread.get(row.threadId) ?? [];
    list.push(row);
    byThread.set(row.threadId, list);
  }

  const summary: SlaSummary = { open: 0, ok: 0, warning: 0, urgent: 0 };
  for (const threadMessages of byThread.values()) {
    summary.open += 1;
    summary[computeSla(threadMessages, now).status] += 1;
  }
  return summary;
}
