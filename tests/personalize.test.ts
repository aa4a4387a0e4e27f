import { describe, expect, it } from 'vitest';
import {
  composeDraft,
  fillEntities,
  personalize,
  personalizeWithReport,
} from '../src/templates/personalize';

describe('personalize', () => {
  it('returns the body unchanged without a profile', () => {
    const body = 'Welcome to {business_name} in {city}!';
    expect(personalize(body, null)).toBe(body);
    expect(personalize(body, undefined)).toBe(body);
    expect(personalize(body, {})).toBe(body);
  });

  it('fills known tokens and leaves empty or unknown ones verbatim', () => {
    const result = personalizeWithReport(
      'Hi from {business_name}, call {phone} or {unknown_token}',
      { businessName: 'Lina', phone: '  ' },
    );
    expect(result).toEqual({
      text: 'Hi from Lina, call {phone} or {unknown_token}',
      replaced: ['business_name'],
      unresolved: ['phone', 'unknown_token'],
    });
  });

  it('replaces every occurrence of a token', () => {
    expect(
      personalize('{city} loves {business_name}. {business_name}!', {
        businessName: 'Glow',
        city: 'Dubai',
      }),
    ).toBe('Dubai loves Glow. Glow!');
  });

  it('does not touch text that only looks like a token', () => {
    const body = 'Use {Business_Name} or { city } or {}';
    expect(personalize(body, { businessName: 'Glow', city: 'Dubai' })).toBe(
      body,
    );
  });
});

describe('fillEntities', () => {
  it('fills extracted entities and keeps missing ones', () => {
    expect(
      fillEntities('See you {day} at {time} for {service}', {
        day: 'friday',
        time: '5pm',
      }),
    ).toBe('See you friday at 5pm for {service}');
  });

  it('ignores inherited object keys', () => {
    expect(fillEntities('{constructor}', {})).toBe('{constructor}');
  });
});

describe('composeDraft', () => {
  it('appends below an existing draft', () => {
    expect(composeDraft('Hello', 'World', 'append')).toBe('Hello\n\nWorld');
  });

  it('replaces the draft', () => {
    expect(composeDraft('Hello', 'World', 'replace')).toBe('World');
  });

  it('uses the insert alone when the draft is blank', () => {
    expect(composeDraft('  ', 'World', 'append')).toBe('World');
  });
});
