import {
  connect,
  NatsError,
  type ConnectionOptions,
  type KV,
  type KvEntry as NatsKvEntry,
  type NatsConnection,
} from "nats";

import { takeUntilIdle } from "./bounded-sequence";
import { KvError } from "./errors";
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

/** JetStream: stream name already in use with a different configuration. */
const STREAM_NAME_IN_USE = 10058;

export interface NatsKvSubstrateOptions {
  /** Extra options merged into every `connect` call. */
  connectionOptions?: Omit<ConnectionOptions, "servers">;
}

export class NatsKvSubstrate implements KvSubstrate {
  readonly name = "nats";

  constructor(private readonly options: NatsKvSubstrateOptions = {}) {}

  async connect(url: string, options: KvConnectOptions = {}): Promise<KvConnection> {
    const nc = await connect({
      reconnect: false,
      ...this.options.connectionOptions,
      servers: url,
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
    });
    return new NatsKvConnection(url, nc);
  }
}

export class NatsKvConnection implements KvConnection {
  constructor(
    readonly url: string,
    private readonly nc: NatsConnection
  ) {}

  async openContext(): Promise<KvContext> {
    this.assertOpen();
    // Fails fast when the server or account has no JetStream.
    await this.nc.jetstreamManager();
    const js = this.nc.jetstream();

    return {
      createOrAttachBucket: async (config: KvBucketConfig): Promise<KvBucket> => {
        this.assertOpen();
        let kv: KV;
        try {
          kv = await js.views.kv(config.name, {
            ttl: config.ttlMs,
            maxValueSize: config.maxValueSize,
            history: 1,
          });
        } catch (error) {
          if (!isStreamInUseError(error)) {
            throw error;
          }
          kv = await js.views.kv(config.name, { bindOnly: true });
        }

        const status = await kv.status();
        return new NatsKvBucket(kv, config.name, status.ttl, status.maxValueSize, () => this.isClosed());
      },
    };
  }

  isClosed(): boolean {
    return this.nc.isClosed();
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) {
      return;
    }
    await this.nc.close();
  }

  private assertOpen(): void {
    if (this.nc.isClosed()) {
      throw new KvError("Connection is closed", "CONNECTION_CLOSED");
    }
  }
}

export class NatsKvBucket implements KvBucket {
  private closed = false;

  constructor(
    private readonly kv: KV,
    readonly name: string,
    readonly ttlMs: number,
    readonly maxValueSize: number,
    private readonly connectionClosed: () => boolean
  ) {}

  async put(key: string, value: Uint8Array): Promise<number> {
    this.assertUsable();
    return this.kv.put(key, value);
  }

  async get(key: string): Promise<KvEntry | null> {
    this.assertUsable();
    const entry = await this.kv.get(key);
    if (!entry || entry.operation !== "PUT") {
      return null;
    }
    return toEntry(entry);
  }

  watchAll(options: KvWatchOptions): AsyncIterable<KvEntry> {
    this.assertUsable();
    const kv = this.kv;
    return {
      async *[Symbol.asyncIterator]() {
        const watcher = await kv.watch({ key: ">", ignoreDeletes: true });
        const entries = takeUntilIdle(watcher[Symbol.asyncIterator](), {
          idleTimeoutMs: options.idleTimeoutMs,
          signal: options.signal,
          stop: () => watcher.stop(),
        });
        for await (const entry of entries) {
          if (entry.operation === "PUT") {
            yield toEntry(entry);
          }
        }
      },
    };
  }

  async close(): Promise<void> {
    // KV views hold no server-side resources of their own.
    this.closed = true;
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

const toEntry = (entry: NatsKvEntry): KvEntry => ({
  bucket: entry.bucket,
  key: entry.key,
  value: Uint8Array.from(entry.value),
  revision: entry.revision,
  created: entry.created,
});

const isStreamInUseError = (error: unknown): boolean => {
  if (!(error instanceof NatsError)) {
    return false;
  }
  return (
    error.api_error?.err_code === STREAM_NAME_IN_USE ||
    /already in use/i.test(error.message)
  );
};
