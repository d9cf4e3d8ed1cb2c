/**
 * MVC Request Middleware
 *
 * Sets up per-request MVC state:
 * 1. Reads the redirect-scope token from the configured carrier
 * 2. Resumes the matching scope (unknown, replayed or expired tokens give a
 *    fresh bag, never an error)
 * 3. Attaches a request-scoped MvcContext as req.mvc
 * 4. Destroys the resumed scope when the response finishes or the
 *    connection closes, including a close that lands while the store
 *    lookup is still pending
 *
 * @module middleware/mvcRequest
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { asyncHandler } from '../errors/errorHandler';
import type { I18nService } from '../i18n/i18nService';
import type { LocaleResolverChain } from '../i18n/localeResolverChain';
import { MvcContext } from '../mvc/mvcContext';
import type { UriBuilder } from '../mvc/uriBuilder';
import type { RedirectScopeManager, ResumedScope } from '../redirectScope/redirectScopeManager';
import type { TokenCarrier } from '../redirectScope/tokenCarrier';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('MVC');

// Extend Express Request to carry the MVC context
declare global {
  namespace Express {
    interface Request {
      mvc: MvcContext;
    }
  }
}

export interface MvcRequestOptions {
  chain: LocaleResolverChain;
  uris: UriBuilder;
  scopes: RedirectScopeManager;
  carrier: TokenCarrier;
  i18n?: I18nService;
}

export function mvcRequest(options: MvcRequestOptions): RequestHandler {
  const { chain, uris, scopes, carrier, i18n } = options;

  return asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const token = carrier.read(req);
    let resumed: ResumedScope | null = null;

    if (token) {
      let ended = false;
      const complete = (): void => {
        if (!resumed) return;
        scopes.complete(resumed.token).catch((error) => {
          log.error('Failed to destroy redirect scope', extractError(error));
        });
      };
      // Listen before the lookup so an early disconnect is not missed;
      // the manager ignores a second complete for the same token
      const onEnd = (): void => {
        ended = true;
        complete();
      };
      res.once('finish', onEnd);
      res.once('close', onEnd);

      resumed = await scopes.resume(token);
      carrier.consumed(res);

      if (ended) {
        complete();
        return;
      }
    }

    req.mvc = new MvcContext({
      request: req,
      chain,
      uris,
      i18n,
      redirectScope: resumed?.bag,
    });

    next();
  });
}

export default mvcRequest;
