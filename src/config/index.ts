/**
 * Service configuration from environment variables (after dotenv).
 */
import { z } from 'zod';
import { REDIRECT_MODES, createNegotiationConfig, type NegotiationConfig } from '../i18n/negotiation';

/** Comma separated list, blanks dropped */
const list = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.string().transform(Number).pipe(z.number().int().positive()).default('4100'),
  DEFAULT_LOCALE: z.string().default('en'),
  SUPPORTED_LOCALES: list.default('en,ja'),
  REDIRECT_MODE: z.enum(REDIRECT_MODES).default('noRedirect'),
  LOCALE_EXCLUDED_PATHS: list.default('/api'),
});

export interface AppConfig {
  /** NODE_ENV as given; only 'test' changes behaviour (no request log). */
  env: string;
  port: number;
  negotiation: NegotiationConfig;
}

/**
 * Validate the environment and build the service configuration.
 * Throws on invalid values rather than starting with a broken setup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    console.error('Environment validation failed:', result.error.format());
    throw new Error('Invalid environment variables');
  }
  const e = result.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    negotiation: createNegotiationConfig({
      defaultLocale: e.DEFAULT_LOCALE,
      supportedLocales: e.SUPPORTED_LOCALES,
      redirectMode: e.REDIRECT_MODE,
      excludedPaths: e.LOCALE_EXCLUDED_PATHS,
    }),
  };
}
