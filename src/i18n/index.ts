/**
 * Reply text in every supported language. Guilds pick theirs with `set language`; the process
 * default comes from BOT_LANGUAGE.
 *
 * A new language is a new table in translations.ts with the same keys, listed in `translations`.
 */

import { pt, en, type TranslationKey } from "./translations.js";

export type { TranslationKey };

const translations = { pt, en } satisfies Record<string, { [K in TranslationKey]: string }>;

export type Locale = keyof typeof translations;

export const DEFAULT_LOCALE: Locale = "en";

export function isLocale(value: string | undefined): value is Locale {
  return value !== undefined && Object.hasOwn(translations, value);
}

export const SUPPORTED_LOCALES: readonly Locale[] = Object.keys(translations).filter(isLocale);

/** `pt`, `PT`, `pt-BR` and `pt_br` all name Portuguese. */
export function parseLocale(raw: string | undefined): Locale | undefined {
  const base = raw?.trim().toLowerCase().split(/[-_]/)[0];
  return isLocale(base) ? base : undefined;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/** Text for `key` with `{name}` placeholders filled from `params`; unknown ones stay as written. */
export function t(
  locale: string | undefined,
  key: TranslationKey,
  params: Record<string, string | number> = {}
): string {
  const lang = isLocale(locale) ? locale : DEFAULT_LOCALE;
  return translations[lang][key].replace(PLACEHOLDER, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}
