/**
 * Redirect-scope bag
 *
 * Values that survive exactly one redirect. A bag restored from a token is
 * readable in full, but only keys written during the current request are
 * carried into the next redirect: scopes never chain on their own.
 *
 * @module redirectScope/bag
 */

export type ScopeRecord = Record<string, unknown>;

export class RedirectScopeBag {
  private readonly values: Map<string, unknown>;
  private readonly written = new Set<string>();

  private constructor(
    initial: ScopeRecord,
    /** True when the bag was restored from a previous request */
    readonly restored: boolean
  ) {
    this.values = new Map(Object.entries(initial));
  }

  static empty(): RedirectScopeBag {
    return new RedirectScopeBag({}, false);
  }

  static restore(record: ScopeRecord): RedirectScopeBag {
    return new RedirectScopeBag(record, true);
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  set(name: string, value: unknown): this {
    this.values.set(name, value);
    this.written.add(name);
    return this;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  delete(name: string): boolean {
    this.written.delete(name);
    return this.values.delete(name);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Everything currently visible in the bag
   */
  toRecord(): ScopeRecord {
    return Object.fromEntries(this.values);
  }

  /**
   * What a redirect issued now would carry forward
   */
  snapshot(): ScopeRecord {
    const record: ScopeRecord = {};
    for (const name of this.written) {
      record[name] = this.values.get(name);
    }
    return record;
  }
}
