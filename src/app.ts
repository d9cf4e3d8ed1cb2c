/**
 * Application assembly
 *
 * Builds the Express app around the MVC core:
 *
 *   requestLogger → body parsers → mvcRequest → controllers → notFoundHandler → errorHandler
 *
 * Everything that can be checked before serving traffic is checked here:
 * controller metadata, route names and whether a request without any locale
 * hints still resolves a locale. Failures surface as ConfigurationError
 * thrown from createApp.
 */

import express, { Express } from 'express';
import type { AppConfig } from './config/types';
import { errorHandler, notFoundHandler } from './errors/errorHandler';
import type { I18nService } from './i18n/i18nService';
import { Locale } from './i18n/locale';
import { LocaleResolverChain } from './i18n/localeResolverChain';
import { DefaultLocaleResolver } from './i18n/resolvers';
import { mvcRequest } from './middleware/mvcRequest';
import { requestLogger } from './middleware/requestLogger';
import { MvcRouter, type ControllerDefinition } from './mvc/router';
import { UriBuilder } from './mvc/uriBuilder';
import type { RedirectScopeManager } from './redirectScope/redirectScopeManager';
import { createTokenCarrier, type TokenCarrier } from './redirectScope/tokenCarrier';
import type { ComponentRegistry } from './registry/types';
import { createLogger } from './utils/logger';

const log = createLogger('APP');

export interface CreateAppOptions {
  config: AppConfig;
  registry: ComponentRegistry;
  scopes: RedirectScopeManager;
  controllers: ControllerDefinition[];
  i18n?: I18nService;
  /** Overrides the carrier selected by config.redirectScope.carrier */
  carrier?: TokenCarrier;
}

export interface MvcApplication {
  app: Express;
  chain: LocaleResolverChain;
  uris: UriBuilder;
  router: MvcRouter;
}

/**
 * @throws ConfigurationError when a controller or the locale setup is invalid
 */
export function createApp(options: CreateAppOptions): MvcApplication {
  const { config, registry, scopes, controllers, i18n } = options;
  const basePath = config.server.basePath;

  const chain = new LocaleResolverChain(
    registry,
    new DefaultLocaleResolver(Locale.of(config.i18n.defaultLocale))
  );
  const fallbackLocale = chain.verify();

  const uris = new UriBuilder(basePath);
  const carrier = options.carrier ?? createTokenCarrier(config.redirectScope, basePath);

  const router = new MvcRouter({
    registry,
    uris,
    scopes,
    carrier,
    viewFolder: config.mvc.viewFolder,
    redirectStatus: config.mvc.redirectStatus,
  });
  for (const controller of controllers) {
    router.route(controller);
  }

  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(basePath || '/', mvcRequest({ chain, uris, scopes, carrier, i18n }), router.router);

  app.use(notFoundHandler);
  app.use(errorHandler);

  log.info('Application assembled', {
    basePath: basePath || '/',
    controllers: controllers.length,
    resolvers: chain.orderedResolvers().map(({ instance }) => instance.name),
    fallbackLocale: fallbackLocale.tag,
    carrier: carrier.kind,
  });

  return { app, chain, uris, router };
}
