import { Redis, type RedisOptions } from "ioredis";
import { z } from "zod";

import { KvError } from "./errors";
import {
  bucketConfigKey,
  bucketRevisionKey,
  entryKey,
  entryKeyPrefix,
  entryPattern,
} from "./redis-keys";
import { PUT_ENTRY_SCRIPT } from "./redis-scripts";
import type {
  KvBucket,
  KvBucketConfig,
  KvConnectOptions,
  KvConnection,
  KvContext,
  KvEntry,
  KvSubstrate,
  KvWatchOptions,
} from "./types";

const StoredBucketConfigSchema = z.object({
  ttlMs: z.number().int().positive(),
  maxValueSize: z.number().int().positive(),
  createdMs: z.number().int().nonnegative(),
});

export type StoredBucketConfig = z.infer<typeof StoredBucketConfigSchema>;

export interface RedisKvSubstrateOptions {
  createClient?: (url: string, options: RedisOptions) => Redis;
  clock?: () => number;
  /** COUNT hint passed to SCAN while enumerating a bucket. */
  scanCount?: number;
}

const DEFAULT_SCAN_COUNT = 100;

/**
 * Buckets on plain Redis: one hash per key with PEXPIRE as the bucket TTL,
 * a shared INCR counter for revisions bumped in the same Lua script that
 * writes the entry, and the bucket configuration stored once with HSETNX so
 * that the first caller creates and the rest attach.
 */
export class RedisKvSubstrate implements KvSubstrate {
  readonly name = "redis";
  private readonly createClient: (url: string, options: RedisOptions) => Redis;
  private readonly clock: () => number;
  private readonly scanCount: number;

  constructor(options: RedisKvSubstrateOptions = {}) {
    this.createClient = options.createClient ?? ((url, redisOptions) => new Redis(url, redisOptions));
    this.clock = options.clock ?? (() => Date.now());
    this.scanCount = options.scanCount ?? DEFAULT_SCAN_COUNT;
  }

  async connect(url: string, options: KvConnectOptions = {}): Promise<KvConnection> {
    const redis = this.createClient(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      ...(options.timeoutMs !== undefined ? { connectTimeout: options.timeoutMs } : {}),
    });

    if (redis.status === "wait") {
      try {
        await redis.connect();
      } catch (error) {
        redis.disconnect();
        throw error;
      }
    }

    return new RedisKvConnection(url, redis, this.clock, this.scanCount);
  }
}

export class RedisKvConnection implements KvConnection {
  private closed = false;

  constructor(
    readonly url: string,
    private readonly redis: Redis,
    private readonly clock: () => number,
    private readonly scanCount: number
  ) {}

  async openContext(): Promise<KvContext> {
    this.assertOpen();
    await this.redis.ping();
    return {
      createOrAttachBucket: (config) => this.createOrAttachBucket(config),
    };
  }

  isClosed(): boolean {
    return this.closed || this.redis.status === "end";
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.redis.status === "end") {
      return;
    }
    await this.redis.quit();
  }

  private async createOrAttachBucket(config: KvBucketConfig): Promise<KvBucket> {
    this.assertOpen();
    if (config.ttlMs <= 0 || config.maxValueSize <= 0) {
      throw new KvError(
        `Invalid bucket configuration for ${config.name}: ttl and max value size must be positive`,
        "INVALID_CONFIG"
      );
    }

    const desired: StoredBucketConfig = {
      ttlMs: config.ttlMs,
      maxValueSize: config.maxValueSize,
      createdMs: this.clock(),
    };
    const configKey = bucketConfigKey(config.name);
    const created = await this.redis.hsetnx(configKey, "config", JSON.stringify(desired));
    const stored = created === 1 ? desired : await this.readStoredConfig(config.name);

    return new RedisKvBucket(
      this.redis,
      config.name,
      stored,
      this.clock,
      this.scanCount,
      () => this.isClosed()
    );
  }

  private async readStoredConfig(bucket: string): Promise<StoredBucketConfig> {
    const raw = await this.redis.hget(bucketConfigKey(bucket), "config");
    if (!raw) {
      throw new KvError(`Bucket ${bucket} has no stored configuration`, "CORRUPT_BUCKET");
    }
    const parsed = StoredBucketConfigSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      throw new KvError(`Bucket ${bucket} has an unreadable configuration`, "CORRUPT_BUCKET");
    }
    return parsed.data;
  }

  private assertOpen(): void {
    if (this.isClosed()) {
      throw new KvError("Connection is closed", "CONNECTION_CLOSED");
    }
  }
}

export class RedisKvBucket implements KvBucket {
  private closed = false;

  constructor(
    private readonly redis: Redis,
    readonly name: string,
    private readonly config: StoredBucketConfig,
    private readonly clock: () => number,
    private readonly scanCount: number,
    private readonly connectionClosed: () => boolean
  ) {}

  get ttlMs(): number {
    return this.config.ttlMs;
  }

  get maxValueSize(): number {
    return this.config.maxValueSize;
  }

  async put(key: string, value: Uint8Array): Promise<number> {
    this.assertUsable();
    if (value.byteLength > this.config.maxValueSize) {
      throw new KvError(
        `Value of ${value.byteLength} bytes exceeds the ${this.config.maxValueSize} byte limit of bucket ${this.name}`,
        "VALUE_TOO_LARGE"
      );
    }

    const result = await this.redis.eval(
      PUT_ENTRY_SCRIPT,
      2,
      bucketRevisionKey(this.name),
      entryKey(this.name, key),
      Buffer.from(value).toString("base64"),
      this.clock().toString(),
      this.config.ttlMs.toString()
    );
    const revision = Number(result);
    if (!Number.isInteger(revision) || revision <= 0) {
      throw new KvError(`Write to ${key} in bucket ${this.name} returned no revision`, "CORRUPT_BUCKET");
    }
    return revision;
  }

  async get(key: string): Promise<KvEntry | null> {
    this.assertUsable();
    return this.readEntry(key);
  }

  /**
   * A SCAN walk has its own end, the cursor returning to "0", so only
   * `signal` bounds it; `idleTimeoutMs` does not apply.
   */
  watchAll(options: KvWatchOptions): AsyncIterable<KvEntry> {
    this.assertUsable();
    return {
      [Symbol.asyncIterator]: () => this.scanEntries(options.signal),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async *scanEntries(
    signal: AbortSignal | undefined
  ): AsyncGenerator<KvEntry, void, undefined> {
    const prefix = entryKeyPrefix(this.name);
    const seen = new Set<string>();
    let cursor = "0";
    do {
      if (signal?.aborted) {
        return;
      }
      const [next, redisKeys] = await this.redis.scan(
        cursor,
        "MATCH",
        entryPattern(this.name),
        "COUNT",
        this.scanCount
      );
      cursor = next;
      for (const redisKey of redisKeys) {
        if (signal?.aborted) {
          return;
        }
        const key = redisKey.slice(prefix.length);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        const entry = await this.readEntry(key);
        if (entry) {
          yield entry;
        }
      }
    } while (cursor !== "0");
  }

  private async readEntry(key: string): Promise<KvEntry | null> {
    const data = await this.redis.hgetall(entryKey(this.name, key));
    if (data.value === undefined || data.revision === undefined) {
      return null;
    }
    return {
      bucket: this.name,
      key,
      value: new Uint8Array(Buffer.from(data.value, "base64")),
      revision: Number(data.revision),
      created: new Date(Number(data.created_ms ?? 0)),
    };
  }

  private assertUsable(): void {
    if (this.closed) {
      throw new KvError(`Bucket ${this.name} is closed`, "BUCKET_CLOSED");
    }
    if (this.connectionClosed()) {
      throw new KvError("Connection is closed", "CONNECTION_CLOSED");
    }
  }
}

const safeJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch (_error) {
    return null;
  }
};
