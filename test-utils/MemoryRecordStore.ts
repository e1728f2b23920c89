import type { IKeyValueCache, IRecordStore } from '../services/interfaces';

/**
 * In-process stand-in for JsonFileStore. Values are cloned on the way in and
 * out so tests observe the same copy semantics as a file round trip.
 */
export class MemoryRecordStore<T> implements IRecordStore<T> {
  readonly records = new Map<string, T>();

  async get(key: string): Promise<T | null> {
    const value = this.records.get(key);
    return value === undefined ? null : structuredClone(value);
  }

  async put(key: string, value: T): Promise<void> {
    this.records.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  async list(): Promise<T[]> {
    return [...this.records.values()].map(value => structuredClone(value));
  }
}

export class MemoryKeyValueCache<V> implements IKeyValueCache<V> {
  readonly entries = new Map<string, V>();
  loadCount = 0;
  saveCount = 0;
  failSave: Error | null = null;

  async load(): Promise<void> {
    this.loadCount++;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  size(): number {
    return this.entries.size;
  }

  async save(): Promise<void> {
    if (this.failSave) throw this.failSave;
    this.saveCount++;
  }
}
