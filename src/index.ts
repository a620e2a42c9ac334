/**
 * Locale negotiation service entrypoint.
 * Sets up the Express server, the locale middleware and a few routes that
 * report what was negotiated.
 */
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import dotenv from 'dotenv';
import { createLangMiddleware } from './middleware/lang';
import { t } from './i18n';
import { loadConfig, type AppConfig } from './config';

// Load environment variables
dotenv.config();

/**
 * Create and configure the Express application.
 */
function createApp(config: AppConfig = loadConfig()) {
  const app = express();
  const { negotiation } = config;

  // Security and common middlewares
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (config.env !== 'test') app.use(morgan('dev'));
  app.use(createLangMiddleware(negotiation));

  /**
   * Health check endpoint with a localized message.
   * /api is excluded from redirects by default, so the locale may be missing.
   */
  app.get('/api/health', (req: Request, res: Response) => {
    const locale = req.locale ?? negotiation.defaultLocale;
    res.json({ ok: true, message: t('health.ok', locale) });
  });

  /**
   * Echo the negotiated locale and the path the routes saw after rewriting.
   */
  app.get('/locale', (req: Request, res: Response) => {
    const locale = req.locale ?? negotiation.defaultLocale;
    res.json({
      ok: true,
      locale: locale.toString(),
      language: locale.language,
      path: req.url,
      message: t('locale.current', locale, { locale: locale.toString() }),
    });
  });

  // Errors from routes (and URI rewrite failures) end up here unchanged
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error(`Request ${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).json({ ok: false, error: t('error.generic', req.locale ?? negotiation.defaultLocale) });
  });

  return app;
}

/**
 * Boot the HTTP server using PORT from environment or default 4100.
 */
function startServer() {
  const config = loadConfig();
  const app = createApp(config);
  app.listen(config.port, () => {
    const { supportedLocales, redirectMode } = config.negotiation;
    console.log(`Locale service listening on http://localhost:${config.port} (${redirectMode}; ${supportedLocales.join(', ')})`);
  });
}

// Export createApp for tests
export { createApp };

// Start the server unless running in test mode
if (process.env.NODE_ENV !== 'test') {
  startServer();
}
