/**
 * Plural Rules
 *
 * CLDR plural categories through Intl.PluralRules, with one cached
 * instance per locale and rule type.
 */

const FALLBACK_LOCALE = 'en';

const rulesCache = new Map<string, Intl.PluralRules>();

/**
 * Canonical BCP 47 tag for a locale code.
 * Accepts POSIX-style underscores (`en_US`); invalid tags become 'en'.
 */
export function normalizeLocale(locale: string): string {
  try {
    return Intl.getCanonicalLocales(locale.replace(/_/g, '-'))[0] ?? FALLBACK_LOCALE;
  } catch (err) {
    if (err instanceof RangeError) return FALLBACK_LOCALE;
    throw err;
  }
}

function pluralRulesFor(
  locale: string,
  type: Intl.PluralRuleType
): Intl.PluralRules {
  const key = `${locale}|${type}`;
  const cached = rulesCache.get(key);
  if (cached) return cached;

  const normalized = normalizeLocale(locale);
  const supported = Intl.PluralRules.supportedLocalesOf(normalized);
  const rules = new Intl.PluralRules(supported[0] ?? FALLBACK_LOCALE, { type });
  rulesCache.set(key, rules);
  return rules;
}

/**
 * Plural category of a number in a locale.
 *
 * @example
 * selectPluralCategory(1, 'en')            // 'one'
 * selectPluralCategory(3, 'en', 'ordinal') // 'few'
 * selectPluralCategory(5, 'pl')            // 'many'
 */
export function selectPluralCategory(
  value: number,
  locale: string,
  type: Intl.PluralRuleType = 'cardinal'
): string {
  if (!Number.isFinite(value)) return 'other';
  return pluralRulesFor(locale, type).select(value);
}
