/**
 * i18n helper for service responses.
 * Dictionaries are keyed by locale tag and picked with the same
 * exact-then-language rule used for negotiation, so `en-GB` reads `en`.
 */
import { KeyNotFoundError, LocaleNotFoundError } from './errors';
import { LocaleTag, parseLocale, resolveLocale } from './localeTag';

const en = {
  'health.ok': 'Locale service is healthy',
  'locale.current': 'Responding in {{locale}}',
  'error.generic': 'Something went wrong',
} as const;

export type MessageKey = keyof typeof en;
type Messages = Record<MessageKey, string>;

const ja: Messages = {
  'health.ok': 'ロケールサービスは正常です',
  'locale.current': '{{locale}} で応答しています',
  'error.generic': 'エラーが発生しました',
};

const catalog: ReadonlyMap<string, Partial<Messages>> = new Map<string, Partial<Messages>>([
  ['en', en],
  ['ja', ja],
]);

export const FALLBACK_LOCALE: LocaleTag = parseLocale('en');

export type Vars = Record<string, string | number>;

export type TranslateResult =
  | { ok: true; value: string }
  | { ok: false; error: LocaleNotFoundError | KeyNotFoundError };

/**
 * Replace `{{name}}` placeholders. A placeholder without a value stays in
 * the output and is reported as a warning.
 */
function interpolate(str: string, vars: Vars | undefined, key: string): string {
  return str.replace(/\{\{(\w+)\}\}/g, (match: string, name: string) => {
    if (vars && name in vars) return String(vars[name]);
    console.warn(`i18n: missing value for {{${name}}} in "${key}"`);
    return match;
  });
}

/**
 * Look up and format a message, reporting failures as values.
 */
export function translate(key: MessageKey, locale: LocaleTag, vars?: Vars): TranslateResult {
  const messages = resolveLocale(locale, catalog);
  if (!messages) return { ok: false, error: new LocaleNotFoundError(locale.toString()) };

  const message = messages[key];
  if (message === undefined) return { ok: false, error: new KeyNotFoundError(key, locale.toString()) };

  return { ok: true, value: interpolate(message, vars, key) };
}

/**
 * Translate a message key for a locale, falling back to English and then
 * to the key itself.
 */
export function t(key: MessageKey, locale: LocaleTag = FALLBACK_LOCALE, vars?: Vars): string {
  const result = translate(key, locale, vars);
  if (result.ok) return result.value;
  if (!locale.equals(FALLBACK_LOCALE)) return t(key, FALLBACK_LOCALE, vars);
  return key;
}
