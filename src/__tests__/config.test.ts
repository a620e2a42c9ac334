import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../i18n/errors';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.env).toBe('development');
    expect(config.port).toBe(4100);
    expect(config.negotiation.defaultLocale.toString()).toBe('en');
    expect(config.negotiation.supportedLocales.map(String)).toEqual(['en', 'ja']);
    expect(config.negotiation.redirectMode).toBe('noRedirect');
    expect(config.negotiation.excludedPaths).toEqual(['/api']);
  });

  it('reads lists and modes from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DEFAULT_LOCALE: 'ja',
      SUPPORTED_LOCALES: ' ja , en-US ,, fr ',
      REDIRECT_MODE: 'redirectToFullLocaleSubPath',
      LOCALE_EXCLUDED_PATHS: '/api,/assets',
    });
    expect(config.port).toBe(8080);
    expect(config.negotiation.defaultLocale.toString()).toBe('ja');
    expect(config.negotiation.supportedLocales.map(String)).toEqual(['ja', 'en-US', 'fr']);
    expect(config.negotiation.redirectMode).toBe('redirectToFullLocaleSubPath');
    expect(config.negotiation.excludedPaths).toEqual(['/api', '/assets']);
  });

  it('accepts any NODE_ENV value', () => {
    expect(loadConfig({ NODE_ENV: 'staging' }).env).toBe('staging');
  });

  it('rejects an unknown redirect mode', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => loadConfig({ REDIRECT_MODE: 'sometimes' })).toThrow('Invalid environment variables');
  });

  it('rejects an invalid locale', () => {
    expect(() => loadConfig({ SUPPORTED_LOCALES: 'en,english language' })).toThrow(ConfigError);
  });
});
