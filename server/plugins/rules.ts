import {
  DEFAULT_RULE_ID,
  GENERAL_INTENT,
  type Confidence,
  type IntentResult,
  type RuleTier,
} from './types';

export type WordBoundary = 'word' | 'none';

export type RuleSource = {
  pattern: string;
  intent: string;
  tier: RuleTier;
};

export type ClassificationRule = {
  id: string;
  intent: string;
  tier: RuleTier;
  matches: (normalizedText: string) => boolean;
};

// language -> rules in evaluation order
export type RuleBook = Map<string, ClassificationRule[]>;

export const FALLBACK_LANGUAGE = 'en';

const TIER_RANK: Record<RuleTier, number> = { phrase: 0, keyword: 1 };

const TIER_CONFIDENCE: Record<RuleTier, Confidence> = {
  phrase: 'HIGH',
  keyword: 'MEDIUM',
};

export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compilePattern(
  pattern: string,
  boundary: WordBoundary,
): RegExp {
  const body = normalizeText(pattern)
    .split(' ')
    .map(escapeRegExp)
    .join('\\s+');
  if (boundary === 'none') {
    return new RegExp(body, 'u');
  }
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'u');
}

/**
 * Builds the ordered rule list for one language. Phrase rules always run
 * before keyword rules; within a tier the source order is kept.
 */
export function compileRules(
  language: string,
  sources: RuleSource[],
  boundary: WordBoundary,
): ClassificationRule[] {
  return sources
    .map((source, position) => ({ source, position }))
    .sort(
      (a, b) =>
        TIER_RANK[a.source.tier] - TIER_RANK[b.source.tier] ||
        a.position - b.position,
    )
    .map(({ source, position }) => {
      const regex = compilePattern(source.pattern, boundary);
      return {
        id: `${language}:${source.tier}:${position}`,
        intent: source.intent,
        tier: source.tier,
        matches: (text: string) => regex.test(text),
      };
    });
}

export function rulesForLanguage(
  book: RuleBook,
  language: string,
): ClassificationRule[] {
  const requested = book.get(language) ?? [];
  if (language === FALLBACK_LANGUAGE) {
    return requested;
  }
  return [...requested, ...(book.get(FALLBACK_LANGUAGE) ?? [])];
}

export function defaultIntent<TIntent extends string>(): IntentResult<TIntent> {
  return { intent: GENERAL_INTENT, confidence: 'LOW', ruleId: DEFAULT_RULE_ID };
}

/**
 * First matching rule wins. Anything unexpected in the input degrades to the
 * default low-confidence `general` intent.
 */
export function classifyWithRules<TIntent extends string>(
  book: RuleBook,
  isIntent: (value: string) => value is TIntent,
  text: unknown,
  language: unknown,
): IntentResult<TIntent> {
  if (typeof text !== 'string' || !text.trim()) {
    return defaultIntent<TIntent>();
  }
  const lang =
    typeof language === 'string' && language.trim()
      ? language.trim().toLowerCase()
      : FALLBACK_LANGUAGE;
  const normalized = normalizeText(text);
  for (const rule of rulesForLanguage(book, lang)) {
    if (rule.matches(normalized) && isIntent(rule.intent)) {
      return {
        intent: rule.intent,
        confidence: TIER_CONFIDENCE[rule.tier],
        ruleId: rule.id,
      };
    }
  }
  return defaultIntent<TIntent>();
}
