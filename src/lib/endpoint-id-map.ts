/**
 * Map keyed by EndpointId value (hashCode buckets, equals within a bucket)
 */

import type { EndpointId } from "./endpoint-id.js";

type Entry<V> = { id: EndpointId; value: V };

export class EndpointIdMap<V> implements Iterable<[EndpointId, V]> {
  private readonly buckets = new Map<number, Entry<V>[]>();
  private count = 0;

  private find(id: EndpointId): Entry<V> | undefined {
    return this.buckets.get(id.hashCode())?.find((e) => e.id.equals(id));
  }

  get size(): number {
    return this.count;
  }

  get(id: EndpointId): V | undefined {
    return this.find(id)?.value;
  }

  has(id: EndpointId): boolean {
    return this.find(id) !== undefined;
  }

  set(id: EndpointId, value: V): this {
    const hash = id.hashCode();
    const bucket = this.buckets.get(hash);
    if (!bucket) {
      this.buckets.set(hash, [{ id, value }]);
      this.count++;
      return this;
    }
    const existing = bucket.find((e) => e.id.equals(id));
    if (existing) {
      existing.value = value;
    } else {
      bucket.push({ id, value });
      this.count++;
    }
    return this;
  }

  delete(id: EndpointId): boolean {
    const hash = id.hashCode();
    const bucket = this.buckets.get(hash);
    if (!bucket) return false;
    const index = bucket.findIndex((e) => e.id.equals(id));
    if (index < 0) return false;
    bucket.splice(index, 1);
    if (bucket.length === 0) this.buckets.delete(hash);
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *entries(): IterableIterator<[EndpointId, V]> {
    for (const bucket of this.buckets.values()) {
      for (const { id, value } of bucket) {
        yield [id, value];
      }
    }
  }

  *keys(): IterableIterator<EndpointId> {
    for (const [id] of this.entries()) yield id;
  }

  [Symbol.iterator](): IterableIterator<[EndpointId, V]> {
    return this.entries();
  }
}
