import { eq } from 'drizzle-orm';
import { z } from 'zod';
import type { InboxDatabase } from '../db';
import { BRAND_TONES, workspace, type WorkspaceRow } from '../db/schema';
import { parseOrThrow } from '../validation';

export type WorkspaceProfile = WorkspaceRow;

const PROFILE_ID = 1;

const profileText = z.string().trim().max(500);

export const SaveProfileSchema = z
  .object({
    businessName: profileText,
    businessType: profileText,
    city: profileText,
    phone: profileText,
    hours: profileText,
    bookingLink: profileText,
    locationLink: profileText,
    brandTone: z.enum(BRAND_TONES),
    defaultLanguage: z
      .string()
      .trim()
      .toLowerCase()
      .regex(/^[a-z]{2,5}$/, 'defaultLanguage must be 2-5 letters'),
  })
  .partial()
  .strict();

export type SaveProfileInput = z.input<typeof SaveProfileSchema>;

/**
 * Returns the workspace profile, creating it with defaults on first access.
 */
export function getProfile(
  db: InboxDatabase,
  options: { now?: Date; defaultLanguage?: string } = {},
): WorkspaceProfile {
  const stamp = (options.now ?? new Date()).toISOString();
  db.insert(workspace)
    .values({
      id: PROFILE_ID,
      defaultLanguage: options.defaultLanguage ?? 'en',
      createdAt: stamp,
      updatedAt: stamp,
    })
    .onConflictDoNothing({ target: workspace.id })
    .run();
  const profile = db
    .select()
    .from(workspace)
    .where(eq(workspace.id, PROFILE_ID))
    .get();
  if (!profile) {
    throw new Error('Workspace profile missing after insert');
  }
  return profile;
}

/**
 * Applies a partial update. Fields left out keep their current values.
 */
export function saveProfile(
  db: InboxDatabase,
  input: unknown,
  options: { now?: Date; defaultLanguage?: string } = {},
): WorkspaceProfile {
  const changes = parseOrThrow(
    SaveProfileSchema,
    input,
    'Invalid workspace profile',
  );
  const now = options.now ?? new Date();
  getProfile(db, { now, defaultLanguage: options.defaultLanguage });
  const updated = db
    .update(workspace)
    .set({ ...changes, updatedAt: now.toISOString() })
    .where(eq(workspace.id, PROFILE_ID))
    .returning()
    .get();
  if (!updated) {
    throw new Error('Workspace profile missing after update');
  }
  console.info(
    `Saved workspace profile (${Object.keys(changes).join(', ') || 'no changes'})`,
  );
  return updated;
}
