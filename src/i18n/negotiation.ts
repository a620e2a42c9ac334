/**
 * Locale negotiation: decides per request whether to attach a locale, pass
 * the request through untouched, or redirect to a locale-prefixed path.
 *
 * The configuration is built once, validated with zod and frozen; it is the
 * only state shared between requests.
 */
import { z } from 'zod';
import { ConfigError } from './errors';
import { LocaleTag, tryParseLocale } from './localeTag';
import { extractFromHeader } from './acceptLanguage';
import { matchPathLocale, rewriteUri } from './localePath';

export const REDIRECT_MODES = ['noRedirect', 'redirectToLanguageSubPath', 'redirectToFullLocaleSubPath'] as const;

/**
 * - noRedirect: locale from Accept-Language (or the default), URL untouched.
 * - redirectToLanguageSubPath: `/en/...`
 * - redirectToFullLocaleSubPath: `/en-US/...`
 */
export type RedirectMode = (typeof REDIRECT_MODES)[number];

export interface NegotiationConfig {
  readonly defaultLocale: LocaleTag;
  readonly supportedLocales: readonly LocaleTag[];
  readonly redirectMode: RedirectMode;
  /** Path prefixes never redirected in the sub-path modes. */
  readonly excludedPaths: readonly string[];
}

export type NegotiationOutcome =
  | { kind: 'attach'; locale: LocaleTag; url: string }
  | { kind: 'passThrough' }
  | { kind: 'redirect'; location: string };

export interface NegotiationRequest {
  /**
   * Request target as in `req.url`: usually origin-form (`/ja/lists?x=1`),
   * but absolute-form (`http://host/ja/lists`) and `*` are valid too.
   */
  url: string;
  acceptLanguage?: string | string[];
}

/** Zod schema: a locale given as a tag string or an already parsed LocaleTag */
const localeSchema = z
  .union([z.custom<LocaleTag>((v) => v instanceof LocaleTag), z.string()])
  .transform((v, ctx) => {
    if (v instanceof LocaleTag) return v;
    const tag = tryParseLocale(v.trim());
    if (!tag) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid locale tag "${v}"` });
      return z.NEVER;
    }
    return tag;
  });

const configSchema = z.object({
  defaultLocale: localeSchema,
  supportedLocales: z.array(localeSchema),
  redirectMode: z.enum(REDIRECT_MODES).default('noRedirect'),
  excludedPaths: z.array(z.string().startsWith('/', 'Excluded paths must start with "/"')).default([]),
});

export type NegotiationConfigInput = z.input<typeof configSchema>;

/**
 * Build the immutable negotiation configuration.
 * Throws ConfigError when a locale or option is invalid.
 */
export function createNegotiationConfig(input: NegotiationConfigInput): NegotiationConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => ({ path: i.path, message: i.message })));
  }
  const { defaultLocale, supportedLocales, redirectMode, excludedPaths } = parsed.data;
  return Object.freeze({
    defaultLocale,
    supportedLocales: Object.freeze([...supportedLocales]),
    redirectMode,
    excludedPaths: Object.freeze([...excludedPaths]),
  });
}

function assertNever(mode: never): never {
  throw new Error(`Unhandled redirect mode: ${String(mode)}`);
}

/**
 * How a locale appears in a path prefix for the given mode.
 */
export function localeRepresentation(tag: LocaleTag, mode: RedirectMode): string {
  switch (mode) {
    case 'redirectToFullLocaleSubPath':
    case 'noRedirect':
      return tag.toString();
    case 'redirectToLanguageSubPath':
      return tag.language;
    default:
      return assertNever(mode);
  }
}

function pathOf(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

const ABSOLUTE_FORM = /^https?:\/\//i;

/**
 * Reduce a request target to origin-form (path plus query).
 * Returns undefined for targets that name no path, such as `OPTIONS *`.
 */
export function toOriginForm(target: string): string | undefined {
  if (target.startsWith('/')) return target;
  if (!ABSOLUTE_FORM.test(target)) return undefined;
  try {
    const parsed = new URL(target);
    return parsed.pathname + parsed.search;
  } catch (e) {
    if (e instanceof TypeError) return undefined;
    throw e;
  }
}

/**
 * Header preference, else the default locale.
 */
export function preferredLocale(config: NegotiationConfig, acceptLanguage?: string | string[]): LocaleTag {
  return extractFromHeader(acceptLanguage, config.supportedLocales) ?? config.defaultLocale;
}

/**
 * Run the per-request decision. Pure: no I/O, no shared mutable state.
 * In the sub-path modes the path is always consulted before the header.
 */
export function negotiate(config: NegotiationConfig, request: NegotiationRequest): NegotiationOutcome {
  const mode = config.redirectMode;
  switch (mode) {
    case 'noRedirect':
      return { kind: 'attach', locale: preferredLocale(config, request.acceptLanguage), url: request.url };

    case 'redirectToLanguageSubPath':
    case 'redirectToFullLocaleSubPath': {
      const url = toOriginForm(request.url);
      if (url === undefined) return { kind: 'passThrough' };

      const path = pathOf(url);
      const fromPath = matchPathLocale(path, config.supportedLocales);
      if (fromPath) {
        // Strip the segment exactly as the client sent it ("/en-us/" as well as "/en-US/")
        return { kind: 'attach', locale: fromPath.locale, url: rewriteUri(url, fromPath.segment) };
      }

      if (config.excludedPaths.some((prefix) => path.startsWith(prefix))) {
        return { kind: 'passThrough' };
      }

      const target = localeRepresentation(preferredLocale(config, request.acceptLanguage), mode);
      return { kind: 'redirect', location: `/${target}${url}` };
    }

    default:
      return assertNever(mode);
  }
}
