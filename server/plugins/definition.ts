import { z } from 'zod';
import { ValidationError } from '../errors';
import { readJsonFile } from '../json';
import { parseOrThrow } from '../validation';
import { extractEntities, type ExtractionRules } from './extract';
import {
  classifyWithRules,
  compileRules,
  type RuleBook,
  type WordBoundary,
} from './rules';
import type { Plugin, TemplateSet } from './types';

const BoundarySchema = z.enum(['word', 'none']);

const RuleSchema = z.object({
  pattern: z.string().trim().min(1),
  intent: z.string().min(1),
  tier: z.enum(['phrase', 'keyword']),
});

export const RuleFileSchema = z.object({
  name: z.string().min(1),
  platforms: z.array(z.string().min(1)).min(1),
  intents: z.array(z.string().min(1)).min(1),
  boundaries: z.record(BoundarySchema),
  rules: z.record(z.array(RuleSchema)),
  extraction: z
    .object({
      lookups: z.record(z.record(z.record(z.string()))).default({}),
      patterns: z.record(z.record(z.array(z.string()))).default({}),
    })
    .default({}),
});

export const TemplateFileSchema = z.record(z.record(z.array(z.string())));

export type RuleFile = z.infer<typeof RuleFileSchema>;

export function loadPluginData(rulesUrl: URL, templatesUrl: URL) {
  const rules = parseOrThrow(
    RuleFileSchema,
    readJsonFile(rulesUrl),
    `Invalid plugin data in ${rulesUrl.pathname}`,
  );
  const templates = parseOrThrow(
    TemplateFileSchema,
    readJsonFile(templatesUrl),
    `Invalid plugin data in ${templatesUrl.pathname}`,
  );
  return { rules, templates };
}

/**
 * Builds a plugin from declarative rule and template data. Every rule and
 * template must name one of the plugin's declared intents.
 */
export function createRulePlugin<TIntent extends string>(
  intents: readonly TIntent[],
  data: { rules: RuleFile; templates: TemplateSet },
): Plugin<TIntent> {
  const { rules, templates } = data;
  const known = new Set<string>(intents);
  const isIntent = (value: string): value is TIntent => known.has(value);

  const unknownIntents = [
    ...rules.intents,
    ...Object.values(rules.rules).flatMap((list) =>
      list.map((rule) => rule.intent),
    ),
    ...Object.values(templates).flatMap((byIntent) => Object.keys(byIntent)),
  ].filter((intent) => !known.has(intent));
  if (unknownIntents.length) {
    throw new ValidationError(`Plugin ${rules.name} uses unknown intents`, [
      ...new Set(unknownIntents),
    ]);
  }

  const book: RuleBook = new Map();
  for (const [language, sources] of Object.entries(rules.rules)) {
    const boundary: WordBoundary = rules.boundaries[language] ?? 'word';
    book.set(language, compileRules(language, sources, boundary));
  }

  const extraction: ExtractionRules = {
    boundaries: rules.boundaries,
    lookups: rules.extraction.lookups,
    patterns: rules.extraction.patterns,
  };

  return {
    name: rules.name,
    supportedPlatforms: new Set(
      rules.platforms.map((platform) => platform.toLowerCase()),
    ),
    intents,
    templates,
    classify: (text, language) =>
      classifyWithRules(book, isIntent, text, language),
    extract: (text, language) => extractEntities(extraction, text, language),
  };
}
