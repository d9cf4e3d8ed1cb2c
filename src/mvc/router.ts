/**
 * MVC Router
 *
 * Registers controllers on an Express router and turns their return values
 * into HTTP responses:
 *
 * - render      → view engine output with the outcome status and headers
 * - redirect    → redirect-scope snapshot, token attached, Location sent
 * - passthrough → wrapper status, headers and entity sent unmodified
 *
 * Controller metadata is validated when the route is registered, so a
 * misconfigured controller stops the application from starting.
 *
 * ## Usage
 *
 * ```typescript
 * const mvc = new MvcRouter({ registry, uris, scopes, carrier, viewFolder: 'views/', redirectStatus: 303 });
 *
 * mvc.route({
 *   method: 'post',
 *   path: '/orders',
 *   metadata: { name: 'OrderController.create', returnKind: 'string' },
 *   handler: (ctx) => {
 *     ctx.redirectScope.set('notice', 'created');
 *     return 'redirect:/orders';
 *   },
 * });
 *
 * app.use(mvc.router);
 * ```
 *
 * @module mvc/router
 */

import { Router, Request, Response } from 'express';
import type { RedirectStatus } from '../config/types';
import { asyncHandler } from '../errors/errorHandler';
import type { RedirectScopeManager } from '../redirectScope/redirectScopeManager';
import type { TokenCarrier } from '../redirectScope/tokenCarrier';
import type { ComponentRegistry } from '../registry/types';
import { createLogger } from '../utils/logger';
import {
  interpret,
  isExternalUri,
  validateControllerMethod,
  type ControllerMethodMetadata,
  type ControllerOutcome,
  type RedirectTo,
  type RenderView,
} from './controllerResult';
import type { MvcContext } from './mvcContext';
import type { UriBuilder } from './uriBuilder';
import { resolveViewPath, selectViewEngine } from './viewEngine';

const log = createLogger('MVC');

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export interface ControllerDefinition {
  method: HttpMethod;
  /** Express path, relative to the application base path */
  path: string;
  /** Route name for outbound links built with MvcContext.uri() */
  name?: string;
  metadata: ControllerMethodMetadata;
  handler: (ctx: MvcContext, req: Request) => unknown;
}

export interface RegisteredRoute {
  method: HttpMethod;
  path: string;
  name?: string;
  controller: string;
}

export interface MvcRouterOptions {
  registry: ComponentRegistry;
  uris: UriBuilder;
  scopes: RedirectScopeManager;
  carrier: TokenCarrier;
  viewFolder: string;
  redirectStatus: RedirectStatus;
}

export class MvcRouter {
  readonly router = Router();
  private readonly registered: RegisteredRoute[] = [];

  constructor(private readonly options: MvcRouterOptions) {}

  /**
   * Register a controller
   *
   * @throws ConfigurationError (or a subclass) for invalid metadata or a
   * clashing route name
   */
  route(definition: ControllerDefinition): this {
    const metadata = validateControllerMethod(definition.metadata);

    if (definition.name) {
      this.options.uris.register(definition.name, definition.path);
    }

    const handler = asyncHandler(async (req: Request, res: Response) => {
      const raw: unknown = await definition.handler(req.mvc, req);
      const outcome = interpret(raw, metadata, {
        basePath: this.options.uris.basePath,
        redirectStatus: this.options.redirectStatus,
      });
      await this.dispatch(outcome, req, res);
    });

    switch (definition.method) {
      case 'get':
        this.router.get(definition.path, handler);
        break;
      case 'post':
        this.router.post(definition.path, handler);
        break;
      case 'put':
        this.router.put(definition.path, handler);
        break;
      case 'patch':
        this.router.patch(definition.path, handler);
        break;
      case 'delete':
        this.router.delete(definition.path, handler);
        break;
    }

    this.registered.push({
      method: definition.method,
      path: definition.path,
      name: definition.name,
      controller: metadata.name,
    });
    log.debug('Controller registered', {
      method: definition.method.toUpperCase(),
      path: definition.path,
      controller: metadata.name,
    });
    return this;
  }

  routes(): RegisteredRoute[] {
    return [...this.registered];
  }

  private async dispatch(outcome: ControllerOutcome, req: Request, res: Response): Promise<void> {
    switch (outcome.kind) {
      case 'render':
        return this.render(outcome, req, res);

      case 'redirect':
        return this.redirect(outcome, req, res);

      case 'passthrough': {
        const { raw } = outcome;
        res.status(raw.statusCode).set(raw.headers);
        if (Buffer.isBuffer(raw.entity)) {
          res.send(raw.entity);
        } else if (typeof raw.entity === 'object') {
          res.json(raw.entity);
        } else {
          res.send(String(raw.entity));
        }
        return;
      }
    }
  }

  private async render(outcome: RenderView, req: Request, res: Response): Promise<void> {
    const ctx = req.mvc;
    const path = resolveViewPath(outcome.path, this.options.viewFolder);
    const engine = selectViewEngine(this.options.registry, path);

    const body = await engine.render({
      path,
      model: ctx.viewModel(),
      locale: ctx.locale,
      context: ctx,
    });

    res
      .status(outcome.statusCode)
      .type(engine.contentType ?? 'html')
      .set(outcome.headers)
      .send(body);
  }

  private async redirect(outcome: RedirectTo, req: Request, res: Response): Promise<void> {
    res.set(outcome.headers);

    // The token is only ever handed back to this application
    if (isExternalUri(outcome.uri)) {
      log.debug('Redirect leaves the application, scope not carried', {
        discarded: Object.keys(req.mvc.redirectScope.snapshot()).length,
      });
      res.redirect(outcome.statusCode, outcome.uri);
      return;
    }

    const token = await this.options.scopes.createScope(req.mvc.redirectScope);
    const location = this.options.carrier.attach(res, outcome.uri, token);
    res.redirect(outcome.statusCode, location);
  }
}
