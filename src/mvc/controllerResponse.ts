/**
 * Controller response wrapper
 *
 * Lets a controller control status and headers itself. When the entity is a
 * view path (or nothing) it is still interpreted as a view or redirect;
 * any other entity is sent as-is.
 *
 * ```typescript
 * return ControllerResponse.status(404, 'not-found.tpl');
 * return ControllerResponse.ok({ id: 1 }).header('Cache-Control', 'no-store');
 * ```
 *
 * @module mvc/controllerResponse
 */

export class ControllerResponse<E = unknown> {
  private readonly headerValues = new Map<string, string>();

  constructor(
    readonly statusCode: number,
    readonly entity: E
  ) {}

  static ok<E>(entity: E): ControllerResponse<E> {
    return new ControllerResponse(200, entity);
  }

  static status<E>(statusCode: number, entity: E): ControllerResponse<E> {
    return new ControllerResponse(statusCode, entity);
  }

  header(name: string, value: string): this {
    this.headerValues.set(name, value);
    return this;
  }

  get headers(): Record<string, string> {
    return Object.fromEntries(this.headerValues);
  }
}
