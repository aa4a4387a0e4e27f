export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export type RuleTier = 'phrase' | 'keyword';

export const GENERAL_INTENT = 'general';
export const DEFAULT_RULE_ID = 'default';

export type IntentResult<TIntent extends string = string> = {
  intent: TIntent | typeof GENERAL_INTENT;
  confidence: Confidence;
  ruleId: string;
};

export type Entities = Record<string, string>;

// language -> intent -> ordered candidate bodies
export type TemplateSet = Record<string, Record<string, string[]>>;

export interface Plugin<TIntent extends string = string> {
  readonly name: string;
  readonly supportedPlatforms: ReadonlySet<string>;
  readonly intents: readonly TIntent[];
  readonly templates: TemplateSet;
  classify(text: string, language: string): IntentResult<TIntent>;
  extract(text: string, language: string): Entities;
}

export type RouteResult =
  | { handled: true; plugin: Plugin }
  | { handled: false; platform: string };
