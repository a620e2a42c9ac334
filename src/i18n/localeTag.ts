/**
 * Locale identifiers and the matching rules shared by negotiation and the
 * message catalog.
 *
 * A tag is `language[-script][-region][-variant]*`, separated by `-` or `_`,
 * e.g. `en`, `en-US`, `zh-Hant-TW`, `de-CH-1996`.
 */
import { ParseError } from './errors';

const LANGUAGE = /^(?:[a-z]{2,3}|[a-z]{5,8})$/i;
const SCRIPT = /^[a-z]{4}$/i;
const REGION = /^(?:[a-z]{2}|[0-9]{3})$/i;
const VARIANT = /^(?:[a-z0-9]{5,8}|[0-9][a-z0-9]{3})$/i;

export class LocaleTag {
  readonly language: string;
  readonly script?: string;
  readonly region?: string;
  readonly variants: readonly string[];

  private constructor(language: string, script: string | undefined, region: string | undefined, variants: string[]) {
    this.language = language;
    this.script = script;
    this.region = region;
    this.variants = Object.freeze(variants);
    Object.freeze(this);
  }

  /**
   * Parse a language tag into its canonical form.
   * Throws ParseError for anything that is not a whole, well-formed tag.
   */
  static parse(text: string): LocaleTag {
    if (text.length === 0) throw new ParseError(text, 'empty tag');

    const parts = text.split(/[-_]/);
    if (parts.some((p) => p.length === 0)) throw new ParseError(text, 'empty subtag');

    const [first, ...rest] = parts;
    if (!LANGUAGE.test(first)) throw new ParseError(text, `invalid language subtag "${first}"`);

    let i = 0;
    let script: string | undefined;
    let region: string | undefined;
    if (i < rest.length && SCRIPT.test(rest[i])) {
      const s = rest[i++];
      script = s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
    }
    if (i < rest.length && REGION.test(rest[i])) {
      region = rest[i++].toUpperCase();
    }
    const variants: string[] = [];
    for (; i < rest.length; i++) {
      if (!VARIANT.test(rest[i])) throw new ParseError(text, `invalid subtag "${rest[i]}"`);
      variants.push(rest[i].toLowerCase());
    }

    return new LocaleTag(first.toLowerCase(), script, region, variants);
  }

  /** Full equality: every subtag matches. */
  equals(other: LocaleTag): boolean {
    return this.toString() === other.toString();
  }

  /** Language equality: only the primary subtag is compared. */
  matchesLanguage(other: LocaleTag): boolean {
    return this.language === other.language;
  }

  toString(): string {
    return [this.language, this.script, this.region, ...this.variants]
      .filter((p): p is string => p !== undefined)
      .join('-');
  }

  toJSON(): string {
    return this.toString();
  }
}

export function parseLocale(text: string): LocaleTag {
  return LocaleTag.parse(text);
}

/**
 * Parse without throwing. Malformed input counts as "no candidate".
 */
export function tryParseLocale(text: string): LocaleTag | undefined {
  try {
    return LocaleTag.parse(text);
  } catch (e) {
    if (e instanceof ParseError) return undefined;
    throw e;
  }
}

/**
 * A tag is supported when some configured locale shares its language,
 * so `en-US` is accepted when only `en` is configured.
 */
export function isSupported(tag: LocaleTag, supported: readonly LocaleTag[]): boolean {
  return supported.some((s) => s.matchesLanguage(tag));
}

/**
 * Look up a registry entry for a tag: exact tag first, then the first key
 * (in Map insertion order) with the same language.
 */
export function resolveLocale<T>(tag: LocaleTag, registry: ReadonlyMap<string, T>): T | undefined {
  const exact = registry.get(tag.toString());
  if (exact !== undefined) return exact;

  for (const [key, entry] of registry) {
    const keyTag = tryParseLocale(key);
    if (keyTag && keyTag.matchesLanguage(tag)) return entry;
  }
  return undefined;
}
