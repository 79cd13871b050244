import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_LOCALE, SUPPORTED_LOCALES, isLocale, parseLocale, t } from "./index.js";
import { en, pt } from "./translations.js";

test("every language has the same keys", () => {
  assert.deepEqual(Object.keys(en).sort(), Object.keys(pt).sort());
});

test("t fills every occurrence of each placeholder", () => {
  assert.equal(t("en", "vcIntervalSet", { minutes: 15 }), "✅ Post interval set to 15 minutes.");
  assert.equal(t("en", "vcApiKeyUsage", { p: "?" }), "Usage: `?vc setapi <key>` or `?vc setapi clear`");
});

test("t leaves unknown placeholders and special replacement characters alone", () => {
  assert.equal(t("en", "vcRemoved", { name: "$& and $1" }), "✅ Removed **$& and $1**.");
  assert.equal(t("en", "vcRemoved"), "✅ Removed **{name}**.");
});

test("t falls back to the default language", () => {
  assert.equal(DEFAULT_LOCALE, "en");
  assert.equal(t("de", "vcHistoryCleared"), "✅ History cleared.");
  assert.equal(t(undefined, "vcHistoryCleared"), "✅ History cleared.");
  assert.equal(t("pt", "vcHistoryCleared"), "✅ Histórico limpo.");
});

test("isLocale accepts only supported languages", () => {
  for (const locale of SUPPORTED_LOCALES) assert.equal(isLocale(locale), true);
  assert.equal(isLocale("EN"), false);
  assert.equal(isLocale(undefined), false);
  assert.equal(isLocale("toString"), false);
  assert.deepEqual(SUPPORTED_LOCALES, ["pt", "en"]);
});

test("parseLocale accepts case and region variants", () => {
  assert.equal(parseLocale(" PT "), "pt");
  assert.equal(parseLocale("pt-BR"), "pt");
  assert.equal(parseLocale("en_us"), "en");
  assert.equal(parseLocale("es"), undefined);
  assert.equal(parseLocale(""), undefined);
  assert.equal(parseLocale(undefined), undefined);
});
