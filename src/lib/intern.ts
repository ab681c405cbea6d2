/**
 * String Interning
 *
 * Flyweight pool for identifier strings: equal values decoded from
 * different keys share one instance.
 */

export interface Interner {
  intern(value: string): string;
}

export class StringInterner implements Interner {
  private readonly pool = new Map<string, string>();

  /**
   * Return the pooled copy of value, adding it on first sight.
   * Lookup and insert complete in the same synchronous step.
   */
  intern(value: string): string {
    const existing = this.pool.get(value);
    if (existing !== undefined) return existing;
    this.pool.set(value, value);
    return value;
  }

  get size(): number {
    return this.pool.size;
  }

  clear(): void {
    this.pool.clear();
  }
}

/**
 * Pass-through interner for callers that do not want pooling
 */
export const identityInterner: Interner = {
  intern: (value) => value,
};

/**
 * Process-wide default pool
 */
export const sharedInterner = new StringInterner();
