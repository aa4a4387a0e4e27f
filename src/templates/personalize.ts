/**
 * Placeholder filling for reply text. Tokens look like `{business_name}`;
 * anything that cannot be resolved is left in the text exactly as written.
 */

export type PersonalizationProfile = {
  businessName?: string | null;
  businessType?: string | null;
  city?: string | null;
  phone?: string | null;
  hours?: string | null;
  bookingLink?: string | null;
  locationLink?: string | null;
  brandTone?: string | null;
  defaultLanguage?: string | null;
};

export type PersonalizeResult = {
  text: string;
  replaced: string[];
  unresolved: string[];
};

export type ComposeMode = 'append' | 'replace';

const TOKEN_PATTERN = /\{([a-z][a-z0-9_]*)\}/g;

const PROFILE_TOKENS: Record<string, keyof PersonalizationProfile> = {
  business_name: 'businessName',
  business_type: 'businessType',
  city: 'city',
  phone: 'phone',
  hours: 'hours',
  booking_link: 'bookingLink',
  location_link: 'locationLink',
  brand_tone: 'brandTone',
  default_language: 'defaultLanguage',
};

function fillTokens(
  body: string,
  resolve: (token: string) => string | null,
): PersonalizeResult {
  const replaced = new Set<string>();
  const unresolved = new Set<string>();
  const text = body.replace(TOKEN_PATTERN, (match, token: string) => {
    const value = resolve(token);
    if (value === null) {
      unresolved.add(token);
      return match;
    }
    replaced.add(token);
    return value;
  });
  return { text, replaced: [...replaced], unresolved: [...unresolved] };
}

function nonEmpty(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  return value.trim() ? value : null;
}

export function personalizeWithReport(
  body: string,
  profile: PersonalizationProfile | null | undefined,
): PersonalizeResult {
  return fillTokens(body, (token) => {
    const field = PROFILE_TOKENS[token];
    if (!profile || !field) return null;
    return nonEmpty(profile[field]);
  });
}

export function personalize(
  body: string,
  profile: PersonalizationProfile | null | undefined,
): string {
  return personalizeWithReport(body, profile).text;
}

export function fillEntities(
  body: string,
  entities: Record<string, string>,
): string {
  return fillTokens(body, (token) =>
    Object.prototype.hasOwnProperty.call(entities, token)
      ? nonEmpty(entities[token])
      : null,
  ).text;
}

export function composeDraft(
  draft: string,
  insert: string,
  mode: ComposeMode,
): string {
  if (mode === 'replace' || !draft.trim()) {
    return insert;
  }
  return `${draft}\n\n${insert}`;
}
