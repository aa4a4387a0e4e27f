import type { Message, ThreadWithMessages } from '../inbox/store';
import type { PluginRegistry } from '../plugins/registry';
import { FALLBACK_LANGUAGE } from '../plugins/rules';
import {
  GENERAL_INTENT,
  type Confidence,
  type Entities,
  type Plugin,
} from '../plugins/types';
import {
  fillEntities,
  personalizeWithReport,
  type PersonalizationProfile,
} from '../../src/templates/personalize';
import { HOUR_MS } from '../../src/shared/time';

export const GENERIC_DEFAULT_REPLIES: Record<string, string> = {
  en: "Thank you for your message! We'll get back to you shortly.",
  ar: 'شكراً لرسالتك! سنعود إليك قريباً.',
};

export const BLOCKED_PHRASES = [
  'password',
  'credit card',
  'ssn',
  'social security',
] as const;

export const MIN_REPLY_LENGTH = 5;
export const MAX_REPLY_LENGTH = 2000;
export const WHATSAPP_WINDOW_HOURS = 24;

export type TemplatePicker = (candidates: readonly string[]) => string;

export const randomPick: TemplatePicker = (candidates) =>
  candidates[Math.floor(Math.random() * candidates.length)] ?? '';

export type ReplyCheck = {
  canSend: boolean;
  warnings: string[];
};

export type ReplySuggestion = ReplyCheck & {
  replyText: string;
  intent: string;
  confidence: Confidence;
  entities: Entities;
  plugin: string | null;
  language: string;
};

export function genericDefaultReply(language: string): string {
  return (
    GENERIC_DEFAULT_REPLIES[language] ??
    GENERIC_DEFAULT_REPLIES[FALLBACK_LANGUAGE] ??
    ''
  );
}

function candidatesFor(
  plugin: Plugin,
  intent: string,
  language: string,
): string[] {
  return (plugin.templates[language]?.[intent] ?? []).filter((body) =>
    body.trim(),
  );
}

/**
 * Picks one template body for the intent. Falls back to English templates,
 * then to the generic default, so the result is never empty.
 */
export function draftReply(
  plugin: Plugin,
  intent: string,
  language: string,
  pick: TemplatePicker = randomPick,
): string {
  const lang = language.trim().toLowerCase() || FALLBACK_LANGUAGE;
  let candidates = candidatesFor(plugin, intent, lang);
  if (!candidates.length && lang !== FALLBACK_LANGUAGE) {
    candidates = candidatesFor(plugin, intent, FALLBACK_LANGUAGE);
  }
  const picked = candidates.length ? pick(candidates) : '';
  return picked.trim() ? picked : genericDefaultReply(lang);
}

export function checkContentSafety(text: string): string[] {
  const lowered = text.toLowerCase();
  const warnings: string[] = [];
  for (const phrase of BLOCKED_PHRASES) {
    if (lowered.includes(phrase)) {
      warnings.push(`Reply contains sensitive information: ${phrase}`);
    }
  }
  if (text.trim().length < MIN_REPLY_LENGTH) {
    warnings.push('Reply is too short');
  }
  if (text.length > MAX_REPLY_LENGTH) {
    warnings.push(`Reply exceeds maximum length (${MAX_REPLY_LENGTH} chars)`);
  }
  return warnings;
}

function lastInbound(messages: Message[]): Message | null {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message && message.direction === 'in') {
      return message;
    }
  }
  return null;
}

// WhatsApp only accepts freeform replies within 24h of the customer's last
// message; after that a pre-approved template message is required.
export function checkWhatsappWindow(
  thread: ThreadWithMessages,
  now: Date,
): string | null {
  if (thread.platform !== 'whatsapp') {
    return null;
  }
  const inbound = lastInbound(thread.messages);
  if (!inbound) {
    return 'No incoming messages in thread';
  }
  const hours = (now.getTime() - Date.parse(inbound.receivedAt)) / HOUR_MS;
  if (hours > WHATSAPP_WINDOW_HOURS) {
    return `WhatsApp 24h window expired (${hours.toFixed(1)}h ago). Use template message.`;
  }
  return null;
}

export function validateReply(
  thread: ThreadWithMessages,
  text: string,
  now: Date = new Date(),
): ReplyCheck {
  const safety = checkContentSafety(text);
  const windowWarning = checkWhatsappWindow(thread, now);
  return {
    canSend: safety.length === 0 && windowWarning === null,
    warnings: windowWarning ? [...safety, windowWarning] : safety,
  };
}

/**
 * Classifies the latest inbound message of the thread and turns the matching
 * template into a ready-to-review reply. Nothing is sent or stored.
 */
export function suggestReply(
  thread: ThreadWithMessages,
  registry: PluginRegistry,
  profile: PersonalizationProfile | null,
  options: { now?: Date; pick?: TemplatePicker } = {},
): ReplySuggestion {
  const now = options.now ?? new Date();
  const inbound = lastInbound(thread.messages);
  const language =
    inbound?.language ?? profile?.defaultLanguage ?? FALLBACK_LANGUAGE;

  if (!thread.messages.length) {
    return {
      replyText: '',
      intent: GENERAL_INTENT,
      confidence: 'LOW',
      entities: {},
      plugin: null,
      language,
      canSend: false,
      warnings: ['No messages in thread'],
    };
  }

  const route = registry.route(thread.platform);
  if (!route.handled) {
    const replyText = personalizeWithReport(
      genericDefaultReply(language),
      profile,
    ).text;
    const check = validateReply(thread, replyText, now);
    return {
      replyText,
      intent: GENERAL_INTENT,
      confidence: 'LOW',
      entities: {},
      plugin: null,
      language,
      canSend: check.canSend,
      warnings: [
        `No plugin handles platform ${route.platform}`,
        ...check.warnings,
      ],
    };
  }

  const { plugin } = route;
  const classified = inbound
    ? plugin.classify(inbound.body, language)
    : { intent: GENERAL_INTENT, confidence: 'LOW' as const };
  const entities = inbound ? plugin.extract(inbound.body, language) : {};
  const draft = draftReply(plugin, classified.intent, language, options.pick);
  const personalized = personalizeWithReport(
    fillEntities(draft, entities),
    profile,
  );
  const check = validateReply(thread, personalized.text, now);
  const warnings = [...check.warnings];
  if (personalized.unresolved.length) {
    warnings.push(
      `Unresolved placeholders: ${personalized.unresolved
        .map((token) => `{${token}}`)
        .join(', ')}`,
    );
  }

  return {
    replyText: personalized.text,
    intent: classified.intent,
    confidence: classified.confidence,
    entities,
    plugin: plugin.name,
    language,
    canSend: check.canSend,
    warnings,
  };
}
