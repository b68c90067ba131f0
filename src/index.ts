export type { Logger, OperationOptions } from "./core/types";
export {
  PresenceError,
  ConfigurationError,
  ConnectionError,
  BucketError,
  HeartbeatError,
  PresenceCheckError,
  PresenceTimeoutError,
} from "./core/errors";
export type { PresenceErrorCode, PresenceErrorContext } from "./core/errors";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";

export {
  PresenceTracker,
  initPresenceTracker,
  withPresenceTracker,
  HeartbeatLoop,
  DEFAULT_MAX_VALUE_SIZE,
  DEFAULT_TIMEOUTS,
  DEFAULT_TTL_SECONDS,
  presenceKeys,
} from "./presence";
export type {
  HeartbeatLoopOptions,
  HeartbeatTarget,
  ListPresentOptions,
  PresenceRecord,
  PresenceTimeouts,
  PresenceTrackerOptions,
} from "./presence";

export {
  KvError,
  MemoryKvServer,
  MemoryKvSubstrate,
  NatsKvSubstrate,
  RedisKvSubstrate,
  getMemoryKvServer,
  resetMemoryKvServers,
  resolveSubstrate,
  takeUntilIdle,
} from "./kv";
export type {
  KvBucket,
  KvBucketConfig,
  KvConnection,
  KvContext,
  KvEntry,
  KvErrorCode,
  KvSubstrate,
  KvWatchOptions,
} from "./kv";

export {
  TraceService,
  InstrumentedPresenceTracker,
  initInstrumentedPresenceTracker,
} from "./tracing";
export type { InstrumentedPresenceTrackerOptions } from "./tracing";
