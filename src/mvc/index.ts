/**
 * MVC Module
 *
 * @module mvc
 */

export { Models } from './models';
export { ControllerResponse } from './controllerResponse';
export {
  interpret,
  validateControllerMethod,
  resolveRedirectUri,
  REDIRECT_PREFIX,
  DEFAULT_REDIRECT_STATUS,
  LEGACY_REDIRECT_STATUS,
  RETURN_KINDS,
} from './controllerResult';
export type {
  ControllerMethodMetadata,
  ControllerOutcome,
  InterpretOptions,
  PassthroughResponse,
  RedirectTo,
  RenderView,
  ReturnKind,
} from './controllerResult';
export { UriBuilder } from './uriBuilder';
export type { UriValue } from './uriBuilder';
export { VIEW_ENGINE, resolveViewPath, selectViewEngine } from './viewEngine';
export type { ViewContext, ViewEngine } from './viewEngine';
export { MvcContext } from './mvcContext';
export type { MvcContextOptions } from './mvcContext';
export { MvcRouter } from './router';
export type { ControllerDefinition, HttpMethod, MvcRouterOptions, RegisteredRoute } from './router';
