import type { BotConfig } from "./botConfig.js";
import { DEFAULT_LOCALE, parseLocale, type Locale } from "./i18n/index.js";

/** Process default from BOT_LANGUAGE, overridden per guild with `set language`. */
export function defaultLanguage(raw: string | undefined = process.env.BOT_LANGUAGE): Locale {
  return parseLocale(raw) ?? DEFAULT_LOCALE;
}

export async function getRuntimeLanguage(
  config: BotConfig,
  guildId: string,
  fallback: Locale = defaultLanguage()
): Promise<Locale> {
  return parseLocale(await config.getLanguage(guildId)) ?? fallback;
}
