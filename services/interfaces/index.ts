/**
 * Base interface for all services
 */
export interface IService {
  /**
   * Initialize the service during application bootstrap
   */
  initialize(): Promise<void>;

  /**
   * Cleanup resources during application shutdown
   */
  cleanup(): Promise<void>;

  /**
   * Check if the service is healthy
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Keyed record persistence. Profiles, conversation sessions, learning
 * sessions and analytics snapshots each live in their own store.
 */
export interface IRecordStore<T> {
  get(key: string): Promise<T | null>;
  put(key: string, value: T): Promise<void>;
  /** @returns false when nothing was stored under the key */
  delete(key: string): Promise<boolean>;
  list(): Promise<T[]>;
}

/**
 * An in-memory map with explicit load and save hooks.
 */
export interface IKeyValueCache<V> {
  load(): Promise<void>;
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  delete(key: string): boolean;
  has(key: string): boolean;
  size(): number;
  save(): Promise<void>;
}

export interface ServiceHealthResult {
  service: string;
  healthy: boolean;
  message?: string;
  timestamp: Date;
}
