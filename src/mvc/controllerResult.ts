/**
 * Controller Result Interpreter
 *
 * Maps whatever a controller returned onto one of three outcomes:
 *
 * | Return                                   | Outcome                               |
 * |------------------------------------------|---------------------------------------|
 * | nothing (returnKind 'void')              | render the method's default view      |
 * | 'some/view.tpl'                          | render that view                      |
 * | 'redirect:/target'                       | redirect (303, or 302 in legacy mode) |
 * | null / undefined string                  | default view, else RequestError       |
 * | ControllerResponse with a view entity    | as above, keeping status and headers  |
 * | ControllerResponse with any other entity | passthrough, sent unmodified          |
 *
 * Metadata problems (unsupported return kind, void without default view)
 * are detected by validateControllerMethod at registration time, before
 * any request is served.
 *
 * @module mvc/controllerResult
 */

import { z } from 'zod';
import type { RedirectStatus } from '../config/types';
import {
  ConfigurationError,
  ErrorCodes,
  MissingDefaultViewError,
  NoViewError,
  RequestError,
  UnsupportedReturnTypeError,
} from '../errors/ApiError';
import { ControllerResponse } from './controllerResponse';

/** Literal prefix marking a returned view path as a redirect (case-sensitive) */
export const REDIRECT_PREFIX = 'redirect:';

export const DEFAULT_REDIRECT_STATUS: RedirectStatus = 303;
export const LEGACY_REDIRECT_STATUS: RedirectStatus = 302;

export const RETURN_KINDS = ['void', 'string', 'response'] as const;
export type ReturnKind = (typeof RETURN_KINDS)[number];

/**
 * Metadata describing one controller method
 */
export interface ControllerMethodMetadata {
  /** Identifies the controller in errors and logs */
  name: string;
  returnKind: ReturnKind;
  /** View rendered when the controller returns nothing or null */
  defaultView?: string;
  /** Per-method redirect status, overriding the application setting */
  redirectStatus?: RedirectStatus;
}

export interface RenderView {
  kind: 'render';
  path: string;
  statusCode: number;
  headers: Record<string, string>;
}

export interface RedirectTo {
  kind: 'redirect';
  uri: string;
  statusCode: number;
  headers: Record<string, string>;
}

export interface PassthroughResponse {
  kind: 'passthrough';
  raw: ControllerResponse;
}

export type ControllerOutcome = RenderView | RedirectTo | PassthroughResponse;

export interface InterpretOptions {
  /** Application base path that relative redirect targets resolve against */
  basePath: string;
  /** Application-wide redirect status */
  redirectStatus: RedirectStatus;
}

const MethodMetadataSchema = z.object({
  name: z.string().min(1),
  returnKind: z.enum(RETURN_KINDS),
  defaultView: z.string().min(1).optional(),
  redirectStatus: z.union([z.literal(302), z.literal(303)]).optional(),
});

/**
 * Check controller metadata at registration time
 *
 * @throws UnsupportedReturnTypeError for an unknown return kind
 * @throws MissingDefaultViewError for a void method without default view
 * @throws ConfigurationError for any other invalid field
 */
export function validateControllerMethod(metadata: ControllerMethodMetadata): ControllerMethodMetadata {
  const result = MethodMetadataSchema.safeParse(metadata);

  if (!result.success) {
    const name = typeof metadata.name === 'string' && metadata.name ? metadata.name : '<unnamed>';
    if (result.error.issues.some((issue) => issue.path[0] === 'returnKind')) {
      throw new UnsupportedReturnTypeError(name, metadata.returnKind);
    }
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(
      `Invalid metadata for controller ${name}`,
      ErrorCodes.CONFIGURATION_ERROR,
      { controller: name, issues }
    );
  }

  const validated = result.data;
  if (validated.returnKind === 'void' && !validated.defaultView) {
    throw new MissingDefaultViewError(validated.name);
  }

  return validated;
}

const ABSOLUTE_URI = /^[A-Za-z][A-Za-z\d+.-]*:/;

/**
 * True for targets that leave the application: a scheme or a protocol-relative `//host`
 */
export function isExternalUri(target: string): boolean {
  return ABSOLUTE_URI.test(target) || target.startsWith('//');
}

/**
 * Resolve a redirect target against the application base path
 *
 * Absolute URIs (with a scheme) and protocol-relative URIs are left alone.
 *
 * @example
 * resolveRedirectUri('/x', '/app')             // '/app/x'
 * resolveRedirectUri('x', '')                  // '/x'
 * resolveRedirectUri('https://example.test/', '/app') // unchanged
 */
export function resolveRedirectUri(target: string, basePath: string): string {
  if (isExternalUri(target)) {
    return target;
  }
  const path = target.startsWith('/') ? target : `/${target}`;
  return `${basePath}${path}`;
}

function isViewEntity(entity: unknown): entity is string | null | undefined {
  return entity === undefined || entity === null || typeof entity === 'string';
}

function renderDefaultView(
  metadata: ControllerMethodMetadata,
  statusCode: number,
  headers: Record<string, string>
): RenderView {
  if (!metadata.defaultView) {
    throw new NoViewError(metadata.name);
  }
  return { kind: 'render', path: metadata.defaultView, statusCode, headers };
}

function interpretView(
  value: unknown,
  metadata: ControllerMethodMetadata,
  options: InterpretOptions,
  statusCode: number,
  headers: Record<string, string>
): RenderView | RedirectTo {
  if (value === undefined || value === null || value === '') {
    return renderDefaultView(metadata, statusCode, headers);
  }

  if (typeof value !== 'string') {
    throw new RequestError(
      `Controller ${metadata.name} returned ${typeof value} where a view path was expected`,
      ErrorCodes.UNEXPECTED_RESULT,
      { controller: metadata.name }
    );
  }

  if (value.startsWith(REDIRECT_PREFIX)) {
    return {
      kind: 'redirect',
      uri: resolveRedirectUri(value.slice(REDIRECT_PREFIX.length), options.basePath),
      statusCode: metadata.redirectStatus ?? options.redirectStatus,
      headers,
    };
  }

  return { kind: 'render', path: value, statusCode, headers };
}

/**
 * Normalize a controller's return value into an outcome
 *
 * Pure: reads only its arguments.
 *
 * @throws RequestError when the value cannot be mapped for this request
 */
export function interpret(
  raw: unknown,
  metadata: ControllerMethodMetadata,
  options: InterpretOptions
): ControllerOutcome {
  switch (metadata.returnKind) {
    case 'void':
      return renderDefaultView(metadata, 200, {});

    case 'string':
      return interpretView(raw, metadata, options, 200, {});

    case 'response':
      if (!(raw instanceof ControllerResponse)) {
        throw new RequestError(
          `Controller ${metadata.name} did not return a ControllerResponse`,
          ErrorCodes.UNEXPECTED_RESULT,
          { controller: metadata.name }
        );
      }
      if (isViewEntity(raw.entity)) {
        return interpretView(raw.entity, metadata, options, raw.statusCode, raw.headers);
      }
      return { kind: 'passthrough', raw };
  }
}
