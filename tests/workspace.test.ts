import { describe, expect, it } from 'vitest';
import { randomUUID } from 'crypto';
import { initDatabase } from '../server/db';
import { workspace } from '../server/db/schema';
import { ValidationError } from '../server/errors';
import { getProfile, saveProfile } from '../server/workspace/store';
import { personalize } from '../src/templates/personalize';

function setupDb() {
  return initDatabase(`/tmp/inbox-test-${randomUUID()}.sqlite`).db;
}

describe('workspace profile', () => {
  it('is created with defaults on first access', () => {
    const db = setupDb();
    const now = new Date('2024-05-01T10:00:00Z');
    const profile = getProfile(db, { now, defaultLanguage: 'ar' });

    expect(profile).toEqual({
      id: 1,
      businessName: '',
      businessType: '',
      city: '',
      phone: '',
      hours: '',
      bookingLink: '',
      locationLink: '',
      brandTone: 'friendly',
      defaultLanguage: 'ar',
      createdAt: '2024-05-01T10:00:00.000Z',
      updatedAt: '2024-05-01T10:00:00.000Z',
    });
    getProfile(db);
    expect(db.select().from(workspace).all()).toHaveLength(1);
  });

  it('applies partial updates in place', () => {
    const db = setupDb();
    getProfile(db, { now: new Date('2024-05-01T10:00:00Z') });
    saveProfile(db, { businessName: "Lina's Salon", city: 'Dubai' });
    const later = new Date('2024-05-02T10:00:00Z');
    const profile = saveProfile(
      db,
      { hours: '9am-9pm', defaultLanguage: 'AR', brandTone: 'formal' },
      { now: later },
    );

    expect(profile).toMatchObject({
      businessName: "Lina's Salon",
      city: 'Dubai',
      hours: '9am-9pm',
      defaultLanguage: 'ar',
      brandTone: 'formal',
      createdAt: '2024-05-01T10:00:00.000Z',
      updatedAt: '2024-05-02T10:00:00.000Z',
    });
    expect(personalize('{business_name} is open {hours}', profile)).toBe(
      "Lina's Salon is open 9am-9pm",
    );
  });

  it('validates language codes, tones and unknown fields', () => {
    const db = setupDb();
    expect(() => saveProfile(db, { defaultLanguage: 'english!' })).toThrow(
      ValidationError,
    );
    expect(() => saveProfile(db, { brandTone: 'grumpy' })).toThrow(
      ValidationError,
    );
    expect(() => saveProfile(db, { business_name: 'Snake' })).toThrow(
      'Invalid workspace profile',
    );
    expect(getProfile(db).brandTone).toBe('friendly');
  });
});
