export interface Cache<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  clear(): void;
  readonly size: number;
}

export class LruCache<V> implements Cache<V> {
  private maxSize: number;
  private map: Map<string, V>;

  constructor(maxSize: number) {
    this.maxSize = Math.max(1, maxSize);
    this.map = new Map();
  }

  get size(): number {
    return this.map.size;
  }

  get(key: string): V | undefined {
    if (!this.map.has(key)) return undefined;
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    if (this.map.size > this.maxSize) {
      const first = this.map.keys().next();
      if (!first.done) this.map.delete(first.value);
    }
  }

  clear(): void {
    this.map.clear();
  }
}
