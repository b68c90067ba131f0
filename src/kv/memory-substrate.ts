import { takeUntilIdle } from "./bounded-sequence";
import { KvError } from "./errors";
import type {
  KvBucket,
  KvBucketConfig,
  KvConnection,
  KvContext,
  KvEntry,
  KvSubstrate,
  KvWatchOptions,
} from "./types";

export interface StoredEntry {
  value: Uint8Array;
  revision: number;
  createdMs: number;
}

export interface MemoryBucketState {
  name: string;
  ttlMs: number;
  maxValueSize: number;
  revision: number;
  entries: Map<string, StoredEntry>;
}

/**
 * In-process stand-in for a KV server: named buckets with a bucket-wide
 * TTL, shared by every connection that points at the same server.
 * Expiry is evaluated lazily against `clock` on every read.
 */
export class MemoryKvServer {
  private readonly buckets = new Map<string, MemoryBucketState>();

  constructor(private readonly clock: () => number = () => Date.now()) {}

  now(): number {
    return this.clock();
  }

  createOrAttach(config: KvBucketConfig): MemoryBucketState {
    const existing = this.buckets.get(config.name);
    if (existing) {
      return existing;
    }
    if (config.ttlMs <= 0 || config.maxValueSize <= 0) {
      throw new KvError(
        `Invalid bucket configuration for ${config.name}: ttl and max value size must be positive`,
        "INVALID_CONFIG"
      );
    }
    const state: MemoryBucketState = {
      name: config.name,
      ttlMs: config.ttlMs,
      maxValueSize: config.maxValueSize,
      revision: 0,
      entries: new Map(),
    };
    this.buckets.set(config.name, state);
    return state;
  }

  hasBucket(name: string): boolean {
    return this.buckets.has(name);
  }

  /** Drops every bucket; for test isolation. */
  reset(): void {
    this.buckets.clear();
  }
}

const servers = new Map<string, MemoryKvServer>();

export function getMemoryKvServer(name = "default"): MemoryKvServer {
  let server = servers.get(name);
  if (!server) {
    server = new MemoryKvServer();
    servers.set(name, server);
  }
  return server;
}

export function resetMemoryKvServers(): void {
  servers.forEach((server) => server.reset());
  servers.clear();
}

export interface MemoryKvSubstrateOptions {
  /** Overrides the server named by the `memory://<name>` URL. */
  server?: MemoryKvServer;
}

export class MemoryKvSubstrate implements KvSubstrate {
  readonly name = "memory";

  constructor(private readonly options: MemoryKvSubstrateOptions = {}) {}

  async connect(url: string): Promise<KvConnection> {
    const server = this.options.server ?? getMemoryKvServer(serverNameFromUrl(url));
    return new MemoryKvConnection(url, server);
  }
}

const serverNameFromUrl = (url: string): string => {
  const parsed = new URL(url);
  return parsed.hostname || "default";
};

export class MemoryKvConnection implements KvConnection {
  private closed = false;

  constructor(
    readonly url: string,
    private readonly server: MemoryKvServer
  ) {}

  async openContext(): Promise<KvContext> {
    this.assertOpen();
    return {
      createOrAttachBucket: async (config: KvBucketConfig): Promise<KvBucket> => {
        this.assertOpen();
        const state = this.server.createOrAttach(config);
        return new MemoryKvBucket(state, this.server, () => this.closed);
      },
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new KvError("Connection is closed", "CONNECTION_CLOSED");
    }
  }
}

export class MemoryKvBucket implements KvBucket {
  private closed = false;

  constructor(
    private readonly state: MemoryBucketState,
    private readonly server: MemoryKvServer,
    private readonly connectionClosed: () => boolean
  ) {}

  get name(): string {
    return this.state.name;
  }

  get ttlMs(): number {
    return this.state.ttlMs;
  }

  get maxValueSize(): number {
    return this.state.maxValueSize;
  }

  async put(key: string, value: Uint8Array): Promise<number> {
    this.assertUsable();
    if (value.byteLength > this.state.maxValueSize) {
      throw new KvError(
        `Value of ${value.byteLength} bytes exceeds the ${this.state.maxValueSize} byte limit of bucket ${this.state.name}`,
        "VALUE_TOO_LARGE"
      );
    }
    this.state.revision += 1;
    this.state.entries.set(key, {
      value: Uint8Array.from(value),
      revision: this.state.revision,
      createdMs: this.server.now(),
    });
    return this.state.revision;
  }

  async get(key: string): Promise<KvEntry | null> {
    this.assertUsable();
    const stored = this.liveEntry(key);
    return stored ? this.toEntry(key, stored) : null;
  }

  watchAll(options: KvWatchOptions): AsyncIterable<KvEntry> {
    this.assertUsable();
    const snapshot = this.snapshot();
    return {
      [Symbol.asyncIterator]: () =>
        takeUntilIdle(iterate(snapshot), {
          idleTimeoutMs: options.idleTimeoutMs,
          signal: options.signal,
        }),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private snapshot(): KvEntry[] {
    const live: KvEntry[] = [];
    for (const key of Array.from(this.state.entries.keys())) {
      const stored = this.liveEntry(key);
      if (stored) {
        live.push(this.toEntry(key, stored));
      }
    }
    return live.sort((a, b) => a.revision - b.revision);
  }

  private liveEntry(key: string): StoredEntry | null {
    const stored = this.state.entries.get(key);
    if (!stored) {
      return null;
    }
    if (this.server.now() - stored.createdMs >= this.state.ttlMs) {
      this.state.entries.delete(key);
      return null;
    }
    return stored;
  }

  private toEntry(key: string, stored: StoredEntry): KvEntry {
    return {
      bucket: this.state.name,
      key,
      value: Uint8Array.from(stored.value),
      revision: stored.revision,
      created: new Date(stored.createdMs),
    };
  }

  private assertUsable(): void {
    if (this.closed) {
      throw new KvError(`Bucket ${this.state.name} is closed`, "BUCKET_CLOSED");
    }
    if (this.connectionClosed()) {
      throw new KvError("Connection is closed", "CONNECTION_CLOSED");
    }
  }
}

async function* iterate<T>(items: T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    yield item;
  }
}
