import { describe, expect, it } from 'vitest';
import type { Message, ThreadWithMessages } from '../server/inbox/store';
import { createDefaultRegistry } from '../server/plugins';
import { createSalonsPlugin } from '../server/plugins/salons';
import {
  checkContentSafety,
  checkWhatsappWindow,
  draftReply,
  GENERIC_DEFAULT_REPLIES,
  suggestReply,
  validateReply,
} from '../server/replies/engine';
import { personalize } from '../src/templates/personalize';

const salons = createSalonsPlugin();
const first = (candidates: readonly string[]) => candidates[0] ?? '';
const last = (candidates: readonly string[]) =>
  candidates[candidates.length - 1] ?? '';

function buildThread(
  platform: string,
  entries: { direction: 'in' | 'out'; body: string; at: string }[],
): ThreadWithMessages {
  const messages: Message[] = entries.map((entry, index) => ({
    id: `m${index}`,
    threadId: 't1',
    senderId: 'u1',
    platform,
    direction: entry.direction,
    body: entry.body,
    language: 'en',
    receivedAt: entry.at,
    rawPayload: null,
  }));
  return {
    id: 't1',
    platform,
    senderId: 'u1',
    title: null,
    status: 'open',
    createdAt: entries[0]?.at ?? '2024-05-01T00:00:00.000Z',
    lastMessageAt: entries[entries.length - 1]?.at ?? '2024-05-01T00:00:00.000Z',
    messages,
  };
}

const profile = { businessName: "Lina's Salon", city: 'Dubai' };

describe('draftReply', () => {
  it('personalizes a price reply with the business name and city', () => {
    for (const pick of [first, last]) {
      const text = personalize(
        draftReply(salons, 'prices', 'en', pick),
        profile,
      );
      expect(text).toContain("Lina's Salon");
      expect(text).toContain('Dubai');
      expect(text).not.toContain('{business_name}');
    }
  });

  it('uses the injected picker', () => {
    expect(draftReply(salons, 'confirmation', 'en', last)).toBe(
      "Great, we've noted that. See you soon!",
    );
  });

  it('falls back to English templates for other languages', () => {
    expect(draftReply(salons, 'prices', 'fr', first)).toBe(
      draftReply(salons, 'prices', 'en', first),
    );
  });

  it('falls back to the generic reply when no template exists', () => {
    expect(draftReply(salons, 'general', 'en')).toBe(
      GENERIC_DEFAULT_REPLIES.en,
    );
    expect(draftReply(salons, 'general', 'ar')).toBe(
      GENERIC_DEFAULT_REPLIES.ar,
    );
    expect(draftReply(salons, 'general', 'fr')).toBe(
      GENERIC_DEFAULT_REPLIES.en,
    );
  });

  it('never returns an empty reply', () => {
    expect(draftReply(salons, 'prices', 'en', () => '')).toBe(
      GENERIC_DEFAULT_REPLIES.en,
    );
  });
});

describe('reply guardrails', () => {
  it('flags sensitive phrases and length limits', () => {
    expect(checkContentSafety('Please send your password')).toEqual([
      'Reply contains sensitive information: password',
    ]);
    expect(checkContentSafety('ok')).toEqual(['Reply is too short']);
    expect(checkContentSafety('x'.repeat(2001))).toEqual([
      'Reply exceeds maximum length (2000 chars)',
    ]);
    expect(checkContentSafety('See you tomorrow!')).toEqual([]);
  });

  it('enforces the WhatsApp 24h window', () => {
    const thread = buildThread('whatsapp', [
      { direction: 'in', body: 'hello', at: '2024-05-01T10:00:00.000Z' },
    ]);
    expect(
      checkWhatsappWindow(thread, new Date('2024-05-02T09:00:00Z')),
    ).toBeNull();
    expect(checkWhatsappWindow(thread, new Date('2024-05-02T16:00:00Z'))).toBe(
      'WhatsApp 24h window expired (30.0h ago). Use template message.',
    );
    expect(
      checkWhatsappWindow(
        buildThread('instagram', []),
        new Date('2024-05-02T16:00:00Z'),
      ),
    ).toBeNull();
  });

  it('combines both checks when validating a manual reply', () => {
    const thread = buildThread('whatsapp', []);
    expect(validateReply(thread, 'Thanks for waiting!')).toEqual({
      canSend: false,
      warnings: ['No incoming messages in thread'],
    });
  });
});

describe('suggestReply', () => {
  const registry = createDefaultRegistry(['salons']);

  it('drafts a personalized reply for the latest inbound message', () => {
    const thread = buildThread('instagram', [
      { direction: 'in', body: 'hi', at: '2024-05-01T09:00:00.000Z' },
      {
        direction: 'in',
        body: 'How much is a haircut?',
        at: '2024-05-01T10:00:00.000Z',
      },
    ]);

    expect(
      suggestReply(thread, registry, profile, {
        now: new Date('2024-05-01T11:00:00Z'),
        pick: first,
      }),
    ).toEqual({
      replyText:
        "Thanks for asking! Prices at Lina's Salon in Dubai depend on the service. Tell us what you have in mind and we'll send the details.",
      intent: 'prices',
      confidence: 'HIGH',
      entities: { service: 'haircut' },
      plugin: 'salons',
      language: 'en',
      canSend: true,
      warnings: [],
    });
  });

  it('warns about unresolved placeholders and an expired WhatsApp window', () => {
    const thread = buildThread('whatsapp', [
      {
        direction: 'in',
        body: 'Are you open on Friday?',
        at: '2024-05-01T10:00:00.000Z',
      },
    ]);

    const suggestion = suggestReply(thread, registry, profile, {
      now: new Date('2024-05-02T16:00:00Z'),
      pick: first,
    });
    expect(suggestion.intent).toBe('hours');
    expect(suggestion.entities).toEqual({ day: 'friday' });
    expect(suggestion.replyText).toBe(
      "Lina's Salon is open {hours}. See you soon!",
    );
    expect(suggestion.canSend).toBe(false);
    expect(suggestion.warnings).toEqual([
      'WhatsApp 24h window expired (30.0h ago). Use template message.',
      'Unresolved placeholders: {hours}',
    ]);
  });

  it('returns the generic reply for unhandled platforms', () => {
    const thread = buildThread('telegram', [
      { direction: 'in', body: 'hello', at: '2024-05-01T10:00:00.000Z' },
    ]);

    const suggestion = suggestReply(thread, registry, profile, {
      now: new Date('2024-05-01T11:00:00Z'),
    });
    expect(suggestion.replyText).toBe(GENERIC_DEFAULT_REPLIES.en);
    expect(suggestion.plugin).toBeNull();
    expect(suggestion.canSend).toBe(true);
    expect(suggestion.warnings).toEqual([
      'No plugin handles platform telegram',
    ]);
  });

  it('cannot suggest anything for an empty thread', () => {
    const suggestion = suggestReply(
      buildThread('instagram', []),
      registry,
      null,
    );
    expect(suggestion.replyText).toBe('');
    expect(suggestion.canSend).toBe(false);
    expect(suggestion.warnings).toEqual(['No messages in thread']);
  });
});
