/**
 * Error classes for locale negotiation and the message catalog.
 * ParseError is recovered locally by every caller; the rest propagate.
 */
export type LocaleErrorCode =
  | 'PARSE_ERROR'
  | 'URI_REWRITE_ERROR'
  | 'CONFIG_ERROR'
  | 'LOCALE_NOT_FOUND'
  | 'KEY_NOT_FOUND';

export abstract class LocaleError extends Error {
  abstract get code(): LocaleErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Text does not conform to the language-tag grammar. */
export class ParseError extends LocaleError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid locale tag "${input}": ${reason}`);
    this.input = input;
  }

  get code(): LocaleErrorCode {
    return 'PARSE_ERROR';
  }
}

/** Rewriting a request URI produced something that is not an absolute path. */
export class UriRewriteError extends LocaleError {
  readonly url: string;

  constructor(url: string, rewritten: string) {
    super(`Rewriting "${url}" produced invalid URI "${rewritten}"`);
    this.url = url;
  }

  get code(): LocaleErrorCode {
    return 'URI_REWRITE_ERROR';
  }
}

export interface ConfigIssue {
  path: (string | number)[];
  message: string;
}

export class ConfigError extends LocaleError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid locale configuration: ${issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`);
    this.issues = issues;
  }

  get code(): LocaleErrorCode {
    return 'CONFIG_ERROR';
  }
}

export class LocaleNotFoundError extends LocaleError {
  constructor(locale: string) {
    super(`No messages registered for locale ${locale}`);
  }

  get code(): LocaleErrorCode {
    return 'LOCALE_NOT_FOUND';
  }
}

export class KeyNotFoundError extends LocaleError {
  readonly key: string;

  constructor(key: string, locale: string) {
    super(`Message key "${key}" not found for locale ${locale}`);
    this.key = key;
  }

  get code(): LocaleErrorCode {
    return 'KEY_NOT_FOUND';
  }
}
