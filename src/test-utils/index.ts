import type { Redis as RedisClient } from "ioredis";
import Redis from "ioredis-mock";

import type { Logger } from "../core/types";
import { MemoryKvServer, MemoryKvSubstrate } from "../kv/memory-substrate";

/**
 * Create a mock Redis client for testing
 */
export function createMockRedis(): RedisClient {
  return new (Redis as unknown as { new (): RedisClient })();
}

/**
 * Sleep for a given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Mock logger for testing
 */
export function createMockLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

/**
 * Memory substrate bound to a private server, so tests never share buckets
 */
export function createMemorySubstrate(): { server: MemoryKvServer; substrate: MemoryKvSubstrate } {
  const server = new MemoryKvServer();
  return { server, substrate: new MemoryKvSubstrate({ server }) };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

/**
 * Promise with its settle functions exposed
 */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
