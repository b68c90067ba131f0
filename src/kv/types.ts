export interface KvEntry {
  bucket: string;
  key: string;
  value: Uint8Array;
  revision: number;
  created: Date;
}

export interface KvBucketConfig {
  name: string;
  ttlMs: number;
  maxValueSize: number;
}

export interface KvWatchOptions {
  /** The sequence ends once no entry arrives within this window. */
  idleTimeoutMs: number;
  signal?: AbortSignal;
}

export interface KvBucket {
  readonly name: string;
  /** Effective TTL; an attached bucket keeps the TTL it was created with. */
  readonly ttlMs: number;
  readonly maxValueSize: number;
  put(key: string, value: Uint8Array): Promise<number>;
  /** Resolves `null` when the key was never written or has expired. */
  get(key: string): Promise<KvEntry | null>;
  watchAll(options: KvWatchOptions): AsyncIterable<KvEntry>;
  close(): Promise<void>;
}

export interface KvContext {
  /** Creates the bucket, or attaches to it when it already exists. */
  createOrAttachBucket(config: KvBucketConfig): Promise<KvBucket>;
}

export interface KvConnection {
  readonly url: string;
  openContext(): Promise<KvContext>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface KvConnectOptions {
  timeoutMs?: number;
}

export interface KvSubstrate {
  readonly name: string;
  connect(url: string, options?: KvConnectOptions): Promise<KvConnection>;
}
