import { asc, desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { InboxDatabase } from '../db';
import {
  LEAD_STATUSES,
  TASK_PRIORITIES,
  leads,
  tasks,
  threads,
  type LeadRow,
  type LeadStatus,
  type TaskRow,
} from '../db/schema';
import { NotFoundError, ValidationError } from '../errors';
import { parseOrThrow } from '../validation';
import { suggestFollowupAt } from '../../src/shared/sla';
import { formatNoteStamp, normalizeTimestamp } from '../../src/shared/time';

export type Lead = LeadRow;

export type Task = TaskRow & {
  suggestedFollowupAt: string;
};

export type LeadPipeline = Record<LeadStatus, Lead[]>;

const optionalText = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

export const CreateLeadSchema = z.object({
  name: optionalText,
  senderId: optionalText,
  phone: optionalText,
  status: z.enum(LEAD_STATUSES).default('new'),
});

export const LeadStatusSchema = z.enum(LEAD_STATUSES);

export const LeadTagsSchema = z
  .array(z.string().trim().min(1, 'tag must not be empty').max(50))
  .max(20)
  .transform((tags) => [...new Set(tags)]);

export const CreateTaskSchema = z.object({
  leadId: z.number().int().positive().nullish(),
  description: z.string().trim().min(1, 'description is required'),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  dueAt: z.string().trim().min(1).nullish(),
});

export type CreateLeadInput = z.input<typeof CreateLeadSchema>;
export type CreateTaskInput = z.input<typeof CreateTaskSchema>;

// won and lost are both terminal and share the last stage.
const PIPELINE_STAGE: Record<LeadStatus, number> = {
  new: 0,
  contacted: 1,
  qualified: 2,
  won: 3,
  lost: 3,
};

export function isBackwardMove(from: LeadStatus, to: LeadStatus): boolean {
  return PIPELINE_STAGE[to] < PIPELINE_STAGE[from];
}

function noteLine(text: string, now: Date): string {
  return `[${formatNoteStamp(now)}] ${text}`;
}

function appendNote(notes: string, line: string): string {
  return notes ? `${notes}\n${line}` : line;
}

export function getLead(db: InboxDatabase, id: number): Lead {
  const lead = db.select().from(leads).where(eq(leads.id, id)).get();
  if (!lead) {
    throw new NotFoundError('Lead', id);
  }
  return lead;
}

export function getLeadByThread(
  db: InboxDatabase,
  threadId: string,
): Lead | null {
  return (
    db
      .select()
      .from(leads)
      .where(eq(leads.threadId, threadId))
      .orderBy(asc(leads.id))
      .get() ?? null
  );
}

/**
 * Creates a lead, optionally linked to the thread it came from. A thread
 * holds at most one lead: creating another returns the existing lead's id.
 * When no name is given the sender id is used instead.
 */
export function createLead(
  db: InboxDatabase,
  input: unknown,
  sourceThreadId: string | null = null,
  now: Date = new Date(),
): number {
  const fields = parseOrThrow(CreateLeadSchema, input, 'Invalid lead');
  const stamp = now.toISOString();

  const result = db.transaction(
    (tx) => {
      let senderId = fields.senderId;
      if (sourceThreadId) {
        const existing = tx
          .select({ id: leads.id })
          .from(leads)
          .where(eq(leads.threadId, sourceThreadId))
          .get();
        if (existing) {
          return { id: existing.id, created: false };
        }
        senderId ??= tx
          .select({ senderId: threads.senderId })
          .from(threads)
          .where(eq(threads.id, sourceThreadId))
          .get()?.senderId;
      }

      const name = fields.name ?? senderId;
      if (!name) {
        throw new ValidationError('Invalid lead', [
          'name: name or sender id is required',
        ]);
      }

      const lead = tx
        .insert(leads)
        .values({
          threadId: sourceThreadId,
          name,
          phone: fields.phone ?? null,
          status: fields.status,
          notes: fields.phone ? noteLine(`Phone: ${fields.phone}`, now) : '',
          createdAt: stamp,
          updatedAt: stamp,
        })
        .returning({ id: leads.id })
        .get();
      if (!lead) {
        throw new Error('Lead insert returned no row');
      }
      return { id: lead.id, created: true };
    },
    { behavior: 'immediate' },
  );

  if (result.created) {
    console.info(
      `Created lead ${result.id}${sourceThreadId ? ` from thread ${sourceThreadId}` : ''}`,
    );
  }
  return result.id;
}

/**
 * Any status may follow any other; moving back down the pipeline is allowed
 * but logged.
 */
export function updateLeadStatus(
  db: InboxDatabase,
  id: number,
  status: unknown,
  now: Date = new Date(),
): Lead {
  const next = parseOrThrow(LeadStatusSchema, status, 'Invalid lead status');
  const current = getLead(db, id);
  if (isBackwardMove(current.status, next)) {
    console.warn(
      `Lead ${id} moved backwards from ${current.status} to ${next}`,
    );
  }
  const updated = db
    .update(leads)
    .set({ status: next, updatedAt: now.toISOString() })
    .where(eq(leads.id, id))
    .returning()
    .get();
  if (!updated) {
    throw new NotFoundError('Lead', id);
  }
  return updated;
}

export function addLeadNote(
  db: InboxDatabase,
  id: number,
  text: string,
  now: Date = new Date(),
): Lead {
  const note = text.trim();
  if (!note) {
    throw new ValidationError('Invalid lead note', ['note: note is required']);
  }
  return db.transaction(
    (tx) => {
      const current = tx
        .select({ notes: leads.notes })
        .from(leads)
        .where(eq(leads.id, id))
        .get();
      if (!current) {
        throw new NotFoundError('Lead', id);
      }
      const updated = tx
        .update(leads)
        .set({
          notes: appendNote(current.notes, noteLine(note, now)),
          updatedAt: now.toISOString(),
        })
        .where(eq(leads.id, id))
        .returning()
        .get();
      if (!updated) {
        throw new NotFoundError('Lead', id);
      }
      return updated;
    },
    { behavior: 'immediate' },
  );
}

/**
 * Replaces the lead's tags. Blank tags are rejected and repeats collapse to
 * their first occurrence.
 */
export function setLeadTags(
  db: InboxDatabase,
  id: number,
  tags: unknown,
  now: Date = new Date(),
): Lead {
  const next = parseOrThrow(LeadTagsSchema, tags, 'Invalid lead tags');
  const updated = db
    .update(leads)
    .set({ tags: next, updatedAt: now.toISOString() })
    .where(eq(leads.id, id))
    .returning()
    .get();
  if (!updated) {
    throw new NotFoundError('Lead', id);
  }
  console.info(`Set tags for lead ${id}: ${next.join(', ') || '(none)'}`);
  return updated;
}

export function emptyPipeline(): LeadPipeline {
  return { new: [], contacted: [], qualified: [], won: [], lost: [] };
}

export function listLeads(
  db: InboxDatabase,
  status?: LeadStatus,
): LeadPipeline {
  const rows = db
    .select()
    .from(leads)
    .where(status ? eq(leads.status, status) : undefined)
    .orderBy(desc(leads.updatedAt), desc(leads.id))
    .all();
  const pipeline = emptyPipeline();
  for (const lead of rows) {
    pipeline[lead.status].push(lead);
  }
  return pipeline;
}

function toTask(row: TaskRow): Task {
  return {
    ...row,
    suggestedFollowupAt: suggestFollowupAt(
      row.priority,
      new Date(row.createdAt),
    ).toISOString(),
  };
}

export function getTask(db: InboxDatabase, id: number): Task {
  const task = db.select().from(tasks).where(eq(tasks.id, id)).get();
  if (!task) {
    throw new NotFoundError('Task', id);
  }
  return toTask(task);
}

/**
 * Creates a follow-up task. Without an explicit `dueAt` the task is due at
 * its suggested follow-up time.
 */
export function createTask(
  db: InboxDatabase,
  input: unknown,
  now: Date = new Date(),
): Task {
  const fields = parseOrThrow(CreateTaskSchema, input, 'Invalid task');
  let dueAt = suggestFollowupAt(fields.priority, now).toISOString();
  if (fields.dueAt) {
    const parsed = normalizeTimestamp(fields.dueAt);
    if (!parsed) {
      throw new ValidationError('Invalid task', [
        `dueAt: unreadable timestamp "${fields.dueAt}"`,
      ]);
    }
    dueAt = parsed;
  }
  const leadId = fields.leadId ?? null;
  if (leadId !== null) {
    getLead(db, leadId);
  }

  const row = db
    .insert(tasks)
    .values({
      leadId,
      description: fields.description,
      priority: fields.priority,
      dueAt,
      done: false,
      createdAt: now.toISOString(),
    })
    .returning()
    .get();
  if (!row) {
    throw new Error('Task insert returned no row');
  }
  console.info(`Created ${row.priority} task ${row.id} due ${row.dueAt}`);
  return toTask(row);
}

export function listTasks(
  db: InboxDatabase,
  options: { includeDone?: boolean } = {},
): Task[] {
  return db
    .select()
    .from(tasks)
    .where(options.includeDone ? undefined : eq(tasks.done, false))
    .orderBy(asc(tasks.dueAt), asc(tasks.id))
    .all()
    .map(toTask);
}

export function completeTask(db: InboxDatabase, id: number): Task {
  const updated = db
    .update(tasks)
    .set({ done: true })
    .where(eq(tasks.id, id))
    .returning()
    .get();
  if (!updated) {
    throw new NotFoundError('Task', id);
  }
  return toTask(updated);
}
