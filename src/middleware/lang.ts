/**
 * Middleware to negotiate the request locale.
 * Attaches `req.locale`, strips a recognised locale prefix from `req.url`,
 * or answers with a 302 to a locale-prefixed path, depending on the
 * configured redirect mode.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { LocaleTag } from '../i18n/localeTag';
import { negotiate, type NegotiationConfig } from '../i18n/negotiation';

declare global {
  namespace Express {
    interface Request {
      /** Absent when the path was excluded from negotiation. */
      locale?: LocaleTag;
    }
  }
}

export function createLangMiddleware(config: NegotiationConfig): RequestHandler {
  return function langMiddleware(req: Request, res: Response, next: NextFunction) {
    const outcome = negotiate(config, { url: req.url, acceptLanguage: req.headers['accept-language'] });

    switch (outcome.kind) {
      case 'attach':
        req.locale = outcome.locale;
        req.url = outcome.url;
        return next();
      case 'passThrough':
        return next();
      case 'redirect':
        res.status(302).setHeader('Location', outcome.location);
        res.end();
        return;
    }
  };
}
