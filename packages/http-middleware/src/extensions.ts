/**
 * Typed key into an {@link Extensions} bag.
 *
 * Each key owns the storage for its values, so reads come back with the key's type
 * without any casting on the bag side.
 */
export class ExtensionKey<T> {
  private readonly values = new WeakMap<Extensions, T>();

  constructor(readonly name: string) {}

  read(bag: Extensions): T | undefined {
    return this.values.get(bag);
  }

  has(bag: Extensions): boolean {
    return this.values.has(bag);
  }

  write(bag: Extensions, value: T): void {
    this.values.set(bag, value);
  }

  erase(bag: Extensions): boolean {
    return this.values.delete(bag);
  }
}

export function extensionKey<T>(name: string): ExtensionKey<T> {
  return new ExtensionKey<T>(name);
}

/**
 * Per-request heterogeneous store threaded through every middleware invocation and every
 * retry attempt of one logical request.
 *
 * @example
 * ```typescript
 * const tenantKey = extensionKey<string>('tenant');
 * const extensions = new Extensions();
 * extensions.set(tenantKey, 'acme');
 * extensions.get(tenantKey); // 'acme'
 * ```
 */
export class Extensions {
  private readonly keys = new Set<ExtensionKey<unknown>>();

  get<T>(key: ExtensionKey<T>): T | undefined {
    return key.read(this);
  }

  has<T>(key: ExtensionKey<T>): boolean {
    return key.has(this);
  }

  set<T>(key: ExtensionKey<T>, value: T): this {
    key.write(this, value);
    this.keys.add(key);
    return this;
  }

  delete<T>(key: ExtensionKey<T>): boolean {
    this.keys.delete(key);
    return key.erase(this);
  }

  getOrInsert<T>(key: ExtensionKey<T>, factory: () => T): T {
    if (key.has(this)) {
      const existing = key.read(this);
      if (existing !== undefined) return existing;
    }
    const value = factory();
    this.set(key, value);
    return value;
  }

  /**
   * Replaces the stored value with `fn(current)`, starting from `initial` when the key is
   * not present. Returns the new value.
   */
  update<T>(key: ExtensionKey<T>, fn: (current: T) => T, initial: T): T {
    const current = key.has(this) ? key.read(this) : undefined;
    const next = fn(current === undefined ? initial : current);
    this.set(key, next);
    return next;
  }

  get size(): number {
    return this.keys.size;
  }

  names(): string[] {
    return [...this.keys].map((key) => key.name);
  }
}
