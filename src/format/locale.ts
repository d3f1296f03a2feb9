import { InvalidLocaleError } from "./errors.js";

/**
 * Canonical BCP 47 form of a locale tag ("en-us" → "en-US").
 * Used as the inner cache key so equivalent spellings share one formatter.
 */
export function canonicalLocale(locale: string): string {
  let canonical: string[];
  try {
    canonical = Intl.getCanonicalLocales(locale);
  } catch (err) {
    throw new InvalidLocaleError(locale, err);
  }
  const first = canonical[0];
  if (first === undefined) {
    throw new InvalidLocaleError(locale, "empty locale tag");
  }
  return first;
}
