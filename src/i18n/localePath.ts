/**
 * Locale prefixes in request paths: `/ja/lists` carries `ja`.
 */
import { UriRewriteError } from './errors';
import { LocaleTag, isSupported, tryParseLocale } from './localeTag';

/** First path segment, e.g. "ja" for "/ja/lists"; "" for "/". */
export function firstSegment(path: string): string | undefined {
  return path.split('/')[1];
}

export interface PathLocale {
  locale: LocaleTag;
  /** The segment as the client wrote it, e.g. "en-us". */
  segment: string;
}

/**
 * Locale prefix of a path together with the raw segment it came from.
 */
export function matchPathLocale(path: string, supported: readonly LocaleTag[]): PathLocale | undefined {
  const segment = firstSegment(path);
  if (segment === undefined) return undefined;

  const locale = tryParseLocale(segment);
  return locale && isSupported(locale, supported) ? { locale, segment } : undefined;
}

/**
 * Locale named by the first path segment, when it parses and is supported.
 */
export function extractFromPath(path: string, supported: readonly LocaleTag[]): LocaleTag | undefined {
  return matchPathLocale(path, supported)?.locale;
}

/**
 * Strip a leading `/<representation>` segment from a URL (path plus optional
 * query), so `/en/enrollment?x=1` becomes `/enrollment?x=1`. Only the leading
 * segment is considered, compared case-insensitively; a URL without that
 * prefix is returned unchanged.
 */
export function rewriteUri(url: string, representation: string): string {
  const prefix = `/${representation}`;
  if (url.slice(0, prefix.length).toLowerCase() !== prefix.toLowerCase()) return url;

  const rest = url.slice(prefix.length);
  const next = rest.charAt(0);
  if (rest.length > 0 && next !== '/' && next !== '?' && next !== '#') return url;

  const rewritten = '/' + rest.replace(/^\//, '');
  if (!isOriginPath(rewritten)) throw new UriRewriteError(url, rewritten);
  return rewritten;
}

const BASE = new URL('http://localhost');

/** True when the string resolves as a path on the same origin, not as "//host/..." */
function isOriginPath(value: string): boolean {
  if (!value.startsWith('/')) return false;
  try {
    return new URL(value, BASE).origin === BASE.origin;
  } catch (e) {
    if (e instanceof TypeError) return false;
    throw e;
  }
}
