import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { InboxDatabase } from '../db';
import { REPLY_SCOPES, savedReplies, type SavedReplyRow } from '../db/schema';
import { NotFoundError } from '../errors';
import { readJsonFile } from '../json';
import { parseOrThrow } from '../validation';

export type SavedReply = SavedReplyRow;

const languageCode = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z]{2,5}$/, 'language must be 2-5 letters');

const ReplyFields = z.object({
  language: languageCode,
  scope: z.enum(REPLY_SCOPES).default('global'),
  pluginName: z.string().trim().min(1).nullish(),
  title: z.string().trim().min(1, 'title is required'),
  body: z
    .string()
    .refine((value) => value.trim().length > 0, 'body is required'),
});

export const CreateReplySchema = ReplyFields.refine(
  (value) => value.scope !== 'plugin' || Boolean(value.pluginName),
  {
    message: 'plugin-scoped replies must name a plugin',
    path: ['pluginName'],
  },
);

export const UpdateReplySchema = ReplyFields.partial();

export type CreateReplyInput = z.input<typeof CreateReplySchema>;
export type UpdateReplyInput = z.input<typeof UpdateReplySchema>;

export type ReplyFilters = {
  scope?: SavedReply['scope'];
  pluginName?: string;
  language?: string;
};

const SeedSchema = z.array(
  z.object({ language: z.string(), title: z.string(), body: z.string() }),
);

export function createReply(
  db: InboxDatabase,
  input: unknown,
  now: Date = new Date(),
): SavedReply {
  const fields = parseOrThrow(CreateReplySchema, input, 'Invalid saved reply');
  const stamp = now.toISOString();
  const reply = db
    .insert(savedReplies)
    .values({
      language: fields.language,
      scope: fields.scope,
      pluginName:
        fields.scope === 'plugin' ? (fields.pluginName ?? null) : null,
      title: fields.title,
      body: fields.body,
      createdAt: stamp,
      updatedAt: stamp,
    })
    .returning()
    .get();
  if (!reply) {
    throw new Error('Saved reply insert returned no row');
  }
  return reply;
}

export function listReplies(
  db: InboxDatabase,
  filters: ReplyFilters = {},
): SavedReply[] {
  const conditions: SQL[] = [];
  if (filters.scope) {
    conditions.push(eq(savedReplies.scope, filters.scope));
  }
  if (filters.pluginName) {
    conditions.push(eq(savedReplies.pluginName, filters.pluginName));
  }
  if (filters.language) {
    conditions.push(
      eq(savedReplies.language, filters.language.trim().toLowerCase()),
    );
  }
  return db
    .select()
    .from(savedReplies)
    .where(conditions.length ? and(...conditions) : undefined)
    .orderBy(asc(savedReplies.language), asc(savedReplies.id))
    .all();
}

export function getReply(db: InboxDatabase, id: number): SavedReply {
  const reply = db
    .select()
    .from(savedReplies)
    .where(eq(savedReplies.id, id))
    .get();
  if (!reply) {
    throw new NotFoundError('Saved reply', id);
  }
  return reply;
}

export function updateReply(
  db: InboxDatabase,
  id: number,
  input: unknown,
  now: Date = new Date(),
): SavedReply {
  const changes = parseOrThrow(UpdateReplySchema, input, 'Invalid saved reply');
  const current = getReply(db, id);
  const merged = parseOrThrow(
    CreateReplySchema,
    {
      language: changes.language ?? current.language,
      scope: changes.scope ?? current.scope,
      pluginName:
        changes.pluginName === undefined
          ? current.pluginName
          : changes.pluginName,
      title: changes.title ?? current.title,
      body: changes.body ?? current.body,
    },
    'Invalid saved reply',
  );
  const updated = db
    .update(savedReplies)
    .set({
      language: merged.language,
      scope: merged.scope,
      pluginName:
        merged.scope === 'plugin' ? (merged.pluginName ?? null) : null,
      title: merged.title,
      body: merged.body,
      updatedAt: now.toISOString(),
    })
    .where(eq(savedReplies.id, id))
    .returning()
    .get();
  if (!updated) {
    throw new NotFoundError('Saved reply', id);
  }
  return updated;
}

export function deleteReply(db: InboxDatabase, id: number): void {
  const result = db.delete(savedReplies).where(eq(savedReplies.id, id)).run();
  if (result.changes === 0) {
    throw new NotFoundError('Saved reply', id);
  }
}

/**
 * Inserts the starter library when no saved replies exist yet. Returns the
 * number of replies inserted.
 */
export function seedDefaultReplies(
  db: InboxDatabase,
  now: Date = new Date(),
): number {
  const defaults = parseOrThrow(
    SeedSchema,
    readJsonFile(new URL('./defaults.json', import.meta.url)),
    'Invalid default replies',
  );
  const stamp = now.toISOString();
  return db.transaction((tx) => {
    const existing = tx
      .select({ count: sql<number>`count(*)` })
      .from(savedReplies)
      .get();
    if (existing && existing.count > 0) {
      return 0;
    }
    for (const reply of defaults) {
      tx.insert(savedReplies)
        .values({
          language: reply.language,
          scope: 'global',
          pluginName: null,
          title: reply.title,
          body: reply.body,
          createdAt: stamp,
          updatedAt: stamp,
        })
        .run();
    }
    console.info(`Seeded ${defaults.length} default replies`);
    return defaults.length;
  });
}
