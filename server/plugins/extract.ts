import type { Entities } from './types';
import { compilePattern, normalizeText, type WordBoundary } from './rules';

// entity -> language -> { phrase as written by customers: canonical value }
export type LookupTable = Record<string, Record<string, Record<string, string>>>;

// entity -> language -> regex sources whose first non-empty group is the value
export type CapturePatterns = Record<string, Record<string, string[]>>;

export type ExtractionRules = {
  boundaries: Record<string, WordBoundary>;
  lookups: LookupTable;
  patterns: CapturePatterns;
};

const PHONE_PATTERN = /(?:\+|00)?\d[\d\s().-]{5,}\d/g;
// yyyy-mm-dd, dd.mm.yyyy, dd-mm-yy, dd/mm/yyyy
const DATE_PATTERN =
  /(?<!\d)(?:\d{4}[./-]\d{1,2}[./-]\d{1,2}|\d{1,2}[./-]\d{1,2}[./-]\d{2,4})(?!\d)/g;
const TIME_PATTERN =
  /\b(?:[01]?\d|2[0-3]):[0-5]\d(?:\s?(?:am|pm))?\b|\b(?:1[0-2]|0?[1-9])\s?(?:am|pm)\b/i;
const MIN_PHONE_DIGITS = 7;
const MAX_PHONE_DIGITS = 15;

export function extractPhone(text: string): string | null {
  // Dates look like phone numbers to the pattern above.
  const withoutDates = text.replace(DATE_PATTERN, ' ');
  for (const match of withoutDates.matchAll(PHONE_PATTERN)) {
    const raw = match[0];
    const digits = raw.replace(/\D/g, '');
    if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
      continue;
    }
    const international = raw.startsWith('+') || raw.startsWith('00');
    const national = raw.startsWith('00') ? digits.slice(2) : digits;
    return international ? `+${national}` : national;
  }
  return null;
}

export function extractTime(text: string): string | null {
  const match = TIME_PATTERN.exec(text);
  return match ? match[0].toLowerCase().replace(/\s+/g, '') : null;
}

function lookup(
  table: Record<string, string>,
  normalized: string,
  boundary: WordBoundary,
): string | null {
  for (const [phrase, value] of Object.entries(table)) {
    if (compilePattern(phrase, boundary).test(normalized)) {
      return value;
    }
  }
  return null;
}

function capture(sources: string[], text: string): string | null {
  for (const source of sources) {
    const match = new RegExp(source, 'iu').exec(text);
    if (!match) continue;
    const value = match.slice(1).find((group) => group && group.trim());
    if (value) return value.trim();
  }
  return null;
}

/**
 * Applies built-in phone and time detection plus the plugin's lookup tables
 * and capture patterns. Returns only the entities that were found.
 */
export function extractEntities(
  rules: ExtractionRules,
  text: unknown,
  language: unknown,
): Entities {
  if (typeof text !== 'string' || !text.trim()) {
    return {};
  }
  const lang =
    typeof language === 'string' && language.trim()
      ? language.trim().toLowerCase()
      : 'en';
  const normalized = normalizeText(text);
  const boundary = rules.boundaries[lang] ?? 'word';
  const entities: Entities = {};

  const phone = extractPhone(text);
  if (phone) entities.phone = phone;
  const time = extractTime(text);
  if (time) entities.time = time;

  for (const [entity, byLanguage] of Object.entries(rules.lookups)) {
    const table = byLanguage[lang];
    if (!table) continue;
    const value = lookup(table, normalized, boundary);
    if (value) entities[entity] = value;
  }

  for (const [entity, byLanguage] of Object.entries(rules.patterns)) {
    const sources = byLanguage[lang];
    if (!sources) continue;
    const value = capture(sources, text);
    if (value) entities[entity] = value;
  }

  return entities;
}
