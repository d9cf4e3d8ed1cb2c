/**
 * View engines
 *
 * Rendering is delegated to pluggable engines registered under VIEW_ENGINE.
 * For each view the highest-priority engine whose supports() accepts the
 * path renders it; engines sharing a priority keep registration order.
 *
 * @module mvc/viewEngine
 */

import { NoViewEngineError } from '../errors/ApiError';
import type { Locale } from '../i18n/locale';
import { defineCapability, orderByPriority } from '../registry/componentRegistry';
import type { ComponentRegistry } from '../registry/types';
import type { MvcContext } from './mvcContext';

export interface ViewContext {
  /** View path after the view folder has been applied */
  path: string;
  model: ReadonlyMap<string, unknown>;
  locale: Locale;
  context: MvcContext;
}

export interface ViewEngine {
  readonly name: string;
  /** Content-Type sent with rendered output (default text/html) */
  readonly contentType?: string;
  supports(path: string): boolean;
  render(view: ViewContext): string | Promise<string>;
}

export const VIEW_ENGINE = defineCapability<ViewEngine>('ViewEngine');

/**
 * Prefix relative view paths with the view folder
 *
 * @example
 * resolveViewPath('home.tpl', 'views/')   // 'views/home.tpl'
 * resolveViewPath('/shared/a.tpl', 'views/') // '/shared/a.tpl'
 */
export function resolveViewPath(path: string, viewFolder: string): string {
  if (path.startsWith('/') || !viewFolder) return path;
  const folder = viewFolder.endsWith('/') ? viewFolder : `${viewFolder}/`;
  return `${folder}${path}`;
}

/**
 * Pick the engine for a view
 *
 * @throws NoViewEngineError when no registered engine supports the path
 */
export function selectViewEngine(registry: ComponentRegistry, path: string): ViewEngine {
  const engines = orderByPriority(registry.listImplementations(VIEW_ENGINE));
  const match = engines.find(({ instance }) => instance.supports(path));
  if (!match) {
    throw new NoViewEngineError(path);
  }
  return match.instance;
}
