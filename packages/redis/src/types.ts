/**
 * Minimal Redis client interface covering only the commands used by our stores.
 * Compatible with ioredis, node-redis, and mock implementations.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<string | null>;
}

/** Options shared by every store. */
export interface RedisStoreOptions {
  /** Prefix prepended to every key the store writes */
  keyPrefix?: string;
}
