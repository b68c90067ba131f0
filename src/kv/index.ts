export type {
  KvBucket,
  KvBucketConfig,
  KvConnectOptions,
  KvConnection,
  KvContext,
  KvEntry,
  KvSubstrate,
  KvWatchOptions,
} from "./types";
export { KvError } from "./errors";
export type { KvErrorCode } from "./errors";
export { takeUntilIdle } from "./bounded-sequence";
export type { BoundedSequenceOptions } from "./bounded-sequence";
export {
  MemoryKvServer,
  MemoryKvSubstrate,
  getMemoryKvServer,
  resetMemoryKvServers,
} from "./memory-substrate";
export type { MemoryKvSubstrateOptions } from "./memory-substrate";
export { NatsKvSubstrate } from "./nats-substrate";
export type { NatsKvSubstrateOptions } from "./nats-substrate";
export { RedisKvSubstrate } from "./redis-substrate";
export type { RedisKvSubstrateOptions } from "./redis-substrate";
export { resolveSubstrate } from "./resolve-substrate";
