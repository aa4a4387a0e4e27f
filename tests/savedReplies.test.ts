import { describe, expect, it } from 'vitest';
import { randomUUID } from 'crypto';
import { initDatabase } from '../server/db';
import { NotFoundError, ValidationError } from '../server/errors';
import {
  createReply,
  deleteReply,
  getReply,
  listReplies,
  seedDefaultReplies,
  updateReply,
} from '../server/replies/store';

function setupDb() {
  return initDatabase(`/tmp/inbox-test-${randomUUID()}.sqlite`).db;
}

const now = new Date('2024-05-01T10:00:00Z');

describe('saved replies', () => {
  it('creates, reads, updates and deletes a reply', () => {
    const db = setupDb();
    const created = createReply(
      db,
      { language: 'EN', title: 'Hours', body: 'We are open {hours}.' },
      now,
    );
    expect(created).toMatchObject({
      language: 'en',
      scope: 'global',
      pluginName: null,
      title: 'Hours',
      createdAt: '2024-05-01T10:00:00.000Z',
    });

    const updated = updateReply(
      db,
      created.id,
      { title: 'Opening hours' },
      new Date('2024-05-02T10:00:00Z'),
    );
    expect(updated.title).toBe('Opening hours');
    expect(updated.body).toBe('We are open {hours}.');
    expect(updated.updatedAt).toBe('2024-05-02T10:00:00.000Z');
    expect(getReply(db, created.id).title).toBe('Opening hours');

    deleteReply(db, created.id);
    expect(() => getReply(db, created.id)).toThrow(NotFoundError);
    expect(() => deleteReply(db, created.id)).toThrow(
      `Saved reply ${created.id} not found`,
    );
  });

  it('requires a plugin name for plugin-scoped replies', () => {
    const db = setupDb();
    expect(() =>
      createReply(db, {
        language: 'en',
        scope: 'plugin',
        title: 'Menu',
        body: 'See our menu',
      }),
    ).toThrow(ValidationError);

    const reply = createReply(db, {
      language: 'en',
      scope: 'plugin',
      pluginName: 'restaurants',
      title: 'Menu',
      body: 'See our menu',
    });
    expect(() => updateReply(db, reply.id, { pluginName: null })).toThrow(
      ValidationError,
    );
  });

  it('filters by scope, plugin and language', () => {
    const db = setupDb();
    createReply(db, { language: 'en', title: 'A', body: 'a body' });
    createReply(db, { language: 'ar', title: 'B', body: 'b body' });
    createReply(db, {
      language: 'en',
      scope: 'plugin',
      pluginName: 'salons',
      title: 'C',
      body: 'c body',
    });

    expect(listReplies(db).map((reply) => reply.title)).toEqual([
      'B',
      'A',
      'C',
    ]);
    expect(listReplies(db, { language: 'en' }).map((r) => r.title)).toEqual([
      'A',
      'C',
    ]);
    expect(listReplies(db, { scope: 'plugin' }).map((r) => r.title)).toEqual([
      'C',
    ]);
    expect(listReplies(db, { pluginName: 'restaurants' })).toEqual([]);
  });

  it('seeds the starter library only into an empty table', () => {
    const db = setupDb();
    const inserted = seedDefaultReplies(db, now);
    expect(inserted).toBe(10);
    expect(listReplies(db, { language: 'ar' })).toHaveLength(5);
    expect(seedDefaultReplies(db, now)).toBe(0);
    expect(listReplies(db)).toHaveLength(10);
  });
});
