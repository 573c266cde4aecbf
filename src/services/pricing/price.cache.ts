/**
 * Bounded least-recently-used cache keyed by (customer, content).
 *
 * Owned by whoever constructs the resolver; nothing here is process-global.
 */
export class PriceCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`PriceCache size must be a positive integer, got ${maxEntries}`);
    }
  }

  static keyFor(enterpriseCustomerUuid: string, contentKey: string): string {
    return `${enterpriseCustomerUuid}::${contentKey}`;
  }

  get size(): number {
    return this.entries.size;
  }

  get(enterpriseCustomerUuid: string, contentKey: string): V | undefined {
    const key = PriceCache.keyFor(enterpriseCustomerUuid, contentKey);
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(enterpriseCustomerUuid: string, contentKey: string, value: V): void {
    const key = PriceCache.keyFor(enterpriseCustomerUuid, contentKey);
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  invalidate(enterpriseCustomerUuid: string, contentKey: string): boolean {
    return this.entries.delete(PriceCache.keyFor(enterpriseCustomerUuid, contentKey));
  }

  clear(): void {
    this.entries.clear();
  }
}
