import {
  BucketError,
  ConnectionError,
  HeartbeatError,
  PresenceCheckError,
  PresenceTimeoutError,
  describeError,
  type PresenceError,
  type PresenceErrorContext,
} from "../core/errors";
import { withTimeout } from "../core/timeout";
import type { Logger, OperationOptions } from "../core/types";
import { resolveSubstrate } from "../kv/resolve-substrate";
import type { KvBucket, KvConnection, KvContext, KvEntry, KvSubstrate } from "../kv/types";
import { clientIdFromKey, presenceKey } from "./keys";
import {
  DEFAULT_MAX_VALUE_SIZE,
  DEFAULT_TTL_SECONDS,
  assertClientId,
  parsePresenceSettings,
  resolveTimeouts,
  type PresenceSettings,
} from "./settings";
import type {
  ListPresentOptions,
  PresenceRecord,
  PresenceTimeouts,
  PresenceTrackerOptions,
} from "./types";

export interface PresenceHandles {
  connection: KvConnection;
  bucket: KvBucket;
}

export interface ResolvedTrackerConfig {
  settings: PresenceSettings;
  timeouts: PresenceTimeouts;
  logger: Logger;
  clock: () => number;
}

type ErrorFactory = (message: string, context: PresenceErrorContext) => PresenceError;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Heartbeat presence over a TTL key-value bucket.
 *
 * Each participant writes `presence.<clientId>`; the bucket TTL evicts keys
 * that stop being refreshed, so a key that exists is a participant that is
 * alive. Reads always go to the bucket. The tracker never schedules
 * heartbeats on its own, see {@link HeartbeatLoop} for an opt-in loop.
 */
export class PresenceTracker {
  private closing: Promise<void> | null = null;

  constructor(
    private readonly handles: PresenceHandles,
    private readonly config: ResolvedTrackerConfig
  ) {}

  get clientId(): string {
    return this.config.settings.clientId;
  }

  get bucketName(): string {
    return this.config.settings.bucketName;
  }

  /** Effective bucket TTL; an attached bucket keeps the TTL it was created with. */
  get ttlMs(): number {
    return this.handles.bucket.ttlMs;
  }

  get ttlSeconds(): number {
    return Math.round(this.handles.bucket.ttlMs / 1000);
  }

  get maxValueSize(): number {
    return this.handles.bucket.maxValueSize;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  protected get logger(): Logger {
    return this.config.logger;
  }

  async sendHeartbeat(options: OperationOptions = {}): Promise<void> {
    const key = presenceKey(this.clientId);
    const context: PresenceErrorContext = {
      operation: "sendHeartbeat",
      bucket: this.bucketName,
      key,
    };
    const toError: ErrorFactory = (message, errorContext) =>
      new HeartbeatError(message, errorContext);
    this.assertOpen(`send heartbeat for ${key}`, context, toError);

    const timestamp = Math.floor(this.config.clock() / 1000).toString();
    await this.execute(
      `send heartbeat for ${key}`,
      context,
      options.timeoutMs ?? this.config.timeouts.heartbeatMs,
      toError,
      () => this.handles.bucket.put(key, encoder.encode(timestamp))
    );
  }

  /**
   * `false` means the key is absent: never written, or expired. Any failure
   * to find out is raised instead.
   */
  async isPresent(clientId: string, options: OperationOptions = {}): Promise<boolean> {
    const entry = await this.readPresenceEntry(clientId, "isPresent", options);
    return entry !== null;
  }

  async lastHeartbeat(
    clientId: string,
    options: OperationOptions = {}
  ): Promise<PresenceRecord | null> {
    const entry = await this.readPresenceEntry(clientId, "lastHeartbeat", options);
    if (!entry) {
      return null;
    }

    const text = decoder.decode(entry.value).trim();
    const seconds = /^\d+$/.test(text) ? Number(text) : null;
    return {
      clientId,
      lastHeartbeatSec: seconds,
      revision: entry.revision,
      created: entry.created,
    };
  }

  /**
   * Point-in-time snapshot of the client ids with a live presence key,
   * sorted. Entries expiring between two calls make consecutive snapshots
   * differ even without new heartbeats.
   */
  async listPresent(options: ListPresentOptions = {}): Promise<string[]> {
    const context: PresenceErrorContext = {
      operation: "listPresent",
      bucket: this.bucketName,
    };
    const toError: ErrorFactory = (message, errorContext) =>
      new PresenceCheckError(message, errorContext);
    this.assertOpen("list present clients", context, toError);

    const idleTimeoutMs = options.idleTimeoutMs ?? this.config.timeouts.listIdleMs;
    const controller = new AbortController();

    const clientIds = await this.execute(
      "list present clients",
      context,
      options.timeoutMs ?? this.config.timeouts.listMs,
      toError,
      async () => {
        const found = new Set<string>();
        const entries = this.handles.bucket.watchAll({
          idleTimeoutMs,
          signal: controller.signal,
        });
        for await (const entry of entries) {
          const clientId = clientIdFromKey(entry.key);
          if (clientId !== null) {
            found.add(clientId);
          }
        }
        return found;
      },
      () => controller.abort()
    );

    return Array.from(clientIds).sort();
  }

  /**
   * Releases the bucket handle, then the connection. Safe to call more than
   * once and never throws; release failures are logged. The bucket and its
   * keys stay in place for other participants.
   */
  close(options: OperationOptions = {}): Promise<void> {
    if (!this.closing) {
      this.closing = this.release(options.timeoutMs ?? this.config.timeouts.closeMs);
    }
    return this.closing;
  }

  private async readPresenceEntry(
    clientId: string,
    operation: string,
    options: OperationOptions
  ): Promise<KvEntry | null> {
    assertClientId(clientId, operation);
    const key = presenceKey(clientId);
    const context: PresenceErrorContext = { operation, bucket: this.bucketName, key };
    const toError: ErrorFactory = (message, errorContext) =>
      new PresenceCheckError(message, errorContext);
    this.assertOpen(`check presence of ${key}`, context, toError);

    return this.execute(
      `check presence of ${key}`,
      context,
      options.timeoutMs ?? this.config.timeouts.checkMs,
      toError,
      () => this.handles.bucket.get(key)
    );
  }

  private async execute<T>(
    action: string,
    context: PresenceErrorContext,
    timeoutMs: number,
    toError: ErrorFactory,
    work: () => Promise<T>,
    onTimeout?: () => void
  ): Promise<T> {
    try {
      return await withTimeout(Promise.resolve().then(work), timeoutMs, {
        onTimeout: () => {
          onTimeout?.();
          return new PresenceTimeoutError(
            `Timed out after ${timeoutMs}ms trying to ${action} in bucket ${this.bucketName}`,
            timeoutMs,
            context
          );
        },
        onLateError: (error) => {
          this.logger.debug(`Late failure after timeout while trying to ${action}`, {
            bucket: this.bucketName,
            error: describeError(error),
          });
        },
      });
    } catch (error) {
      if (error instanceof PresenceTimeoutError) {
        throw error;
      }
      throw toError(
        `Failed to ${action} in bucket ${this.bucketName}: ${describeError(error)}`,
        { ...context, cause: error }
      );
    }
  }

  private assertOpen(action: string, context: PresenceErrorContext, toError: ErrorFactory): void {
    if (this.closing) {
      throw toError(`Cannot ${action}: presence tracker is closed`, context);
    }
  }

  private async release(timeoutMs: number): Promise<void> {
    await this.releaseHandle("bucket", () => this.handles.bucket.close(), timeoutMs);
    await this.releaseHandle("connection", () => this.handles.connection.close(), timeoutMs);
    this.logger.debug("Presence tracker closed", {
      bucket: this.bucketName,
      clientId: this.clientId,
    });
  }

  private async releaseHandle(
    name: "bucket" | "connection",
    release: () => Promise<void>,
    timeoutMs: number
  ): Promise<void> {
    try {
      await withTimeout(Promise.resolve().then(release), timeoutMs, {
        onTimeout: () => new Error(`Timed out after ${timeoutMs}ms`),
        onLateError: (error) => {
          this.logger.debug(`Late failure releasing presence ${name}`, {
            error: describeError(error),
          });
        },
      });
    } catch (error) {
      this.logger.warn(`Failed to release presence ${name}`, {
        bucket: this.bucketName,
        clientId: this.clientId,
        error: describeError(error),
      });
    }
  }
}

export function resolveTrackerConfig(
  url: string,
  bucketName: string,
  clientId: string,
  ttlSeconds: number,
  options: PresenceTrackerOptions = {}
): ResolvedTrackerConfig {
  return {
    settings: parsePresenceSettings({
      url,
      bucketName,
      clientId,
      ttlSeconds,
      maxValueSize: options.maxValueSize ?? DEFAULT_MAX_VALUE_SIZE,
    }),
    timeouts: resolveTimeouts(options.timeouts),
    logger: options.logger ?? console,
    clock: options.clock ?? (() => Date.now()),
  };
}

/**
 * Connects, acquires a key-value context and creates the bucket, or attaches
 * to it when another participant created it first. The connection is closed
 * again when a later stage fails.
 */
export async function openPresenceHandles(
  config: ResolvedTrackerConfig,
  substrate: KvSubstrate
): Promise<PresenceHandles> {
  const { settings, timeouts, logger } = config;
  const base: PresenceErrorContext = { operation: "initialize", bucket: settings.bucketName };
  const timeoutError = (action: string) =>
    new PresenceTimeoutError(
      `Timed out after ${timeouts.connectMs}ms trying to ${action}`,
      timeouts.connectMs,
      base
    );

  let connection: KvConnection;
  try {
    connection = await withTimeout(
      Promise.resolve().then(() =>
        substrate.connect(settings.url, { timeoutMs: timeouts.connectMs })
      ),
      timeouts.connectMs,
      {
        onTimeout: () => timeoutError(`connect to ${settings.url}`),
        onLateResult: (late) => {
          void closeQuietly(late, logger);
        },
        onLateError: (error) => {
          logger.debug("Late connection failure after timeout", { error: describeError(error) });
        },
      }
    );
  } catch (error) {
    if (error instanceof PresenceTimeoutError) {
      throw error;
    }
    throw new ConnectionError(
      `Failed to connect to ${settings.url}: ${describeError(error)}`,
      { ...base, cause: error }
    );
  }

  let context: KvContext;
  try {
    context = await withTimeout(connection.openContext(), timeouts.connectMs, {
      onTimeout: () => timeoutError(`acquire a key-value context on ${settings.url}`),
    });
  } catch (error) {
    await closeQuietly(connection, logger);
    if (error instanceof PresenceTimeoutError) {
      throw error;
    }
    throw new ConnectionError(
      `Failed to acquire a key-value context on ${settings.url}: ${describeError(error)}`,
      { ...base, cause: error }
    );
  }

  let bucket: KvBucket;
  try {
    bucket = await withTimeout(
      context.createOrAttachBucket({
        name: settings.bucketName,
        ttlMs: settings.ttlSeconds * 1000,
        maxValueSize: settings.maxValueSize,
      }),
      timeouts.connectMs,
      { onTimeout: () => timeoutError(`create or attach bucket ${settings.bucketName}`) }
    );
  } catch (error) {
    await closeQuietly(connection, logger);
    if (error instanceof PresenceTimeoutError) {
      throw error;
    }
    throw new BucketError(
      `Failed to create or attach bucket ${settings.bucketName}: ${describeError(error)}`,
      { ...base, cause: error }
    );
  }

  if (bucket.ttlMs !== settings.ttlSeconds * 1000) {
    logger.warn("Attached to an existing presence bucket with a different TTL", {
      bucket: settings.bucketName,
      requestedTtlMs: settings.ttlSeconds * 1000,
      effectiveTtlMs: bucket.ttlMs,
    });
  }
  logger.debug("Presence bucket ready", {
    bucket: settings.bucketName,
    clientId: settings.clientId,
    ttlMs: bucket.ttlMs,
  });

  return { connection, bucket };
}

export async function initPresenceTracker(
  url: string,
  bucketName: string,
  clientId: string,
  ttlSeconds: number = DEFAULT_TTL_SECONDS,
  options: PresenceTrackerOptions = {}
): Promise<PresenceTracker> {
  const config = resolveTrackerConfig(url, bucketName, clientId, ttlSeconds, options);
  const substrate = options.substrate ?? resolveSubstrate(config.settings.url);
  const handles = await openPresenceHandles(config, substrate);
  return new PresenceTracker(handles, config);
}

/** Runs `fn` with a fresh tracker and closes it on every exit path. */
export async function withPresenceTracker<T>(
  url: string,
  bucketName: string,
  clientId: string,
  ttlSeconds: number,
  fn: (tracker: PresenceTracker) => Promise<T>,
  options: PresenceTrackerOptions = {}
): Promise<T> {
  const tracker = await initPresenceTracker(url, bucketName, clientId, ttlSeconds, options);
  try {
    return await fn(tracker);
  } finally {
    await tracker.close();
  }
}

async function closeQuietly(connection: KvConnection, logger: Logger): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    logger.warn("Failed to close presence connection", { error: describeError(error) });
  }
}
