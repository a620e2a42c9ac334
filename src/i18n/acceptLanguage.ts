/**
 * Accept-Language parsing.
 * Returns the client's first supported preference in header order; quality
 * values are stripped, never used for ranking.
 * https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Accept-Language
 */
import { LocaleTag, isSupported, tryParseLocale } from './localeTag';

export function extractFromHeader(
  header: string | string[] | undefined,
  supported: readonly LocaleTag[],
): LocaleTag | undefined {
  if (header === undefined) return undefined;
  const value = Array.isArray(header) ? header.join(',') : header;

  // Simple single-value headers ("en", "ja-JP")
  const whole = tryParseLocale(value.trim());
  if (whole && isSupported(whole, supported)) return whole;

  for (const segment of value.split(',')) {
    const semi = segment.indexOf(';');
    const candidate = (semi === -1 ? segment : segment.slice(0, semi)).trim();
    if (!candidate) continue;

    const tag = tryParseLocale(candidate);
    if (tag && isSupported(tag, supported)) return tag;
  }
  return undefined;
}
