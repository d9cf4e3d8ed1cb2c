/**
 * Model map
 *
 * Named values written by controllers and read by view engines. Lives for
 * one request.
 *
 * @module mvc/models
 */

export class Models {
  private readonly values = new Map<string, unknown>();

  put(name: string, value: unknown): this {
    this.values.set(name, value);
    return this;
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }

  get size(): number {
    return this.values.size;
  }

  asMap(): ReadonlyMap<string, unknown> {
    return new Map(this.values);
  }
}
