import type { Logger } from "../core/types";
import type { KvSubstrate } from "../kv/types";

export interface PresenceTimeouts {
  connectMs: number;
  heartbeatMs: number;
  checkMs: number;
  listMs: number;
  /** Gap after which a `listPresent` enumeration is considered complete. */
  listIdleMs: number;
  closeMs: number;
}

export interface PresenceTrackerOptions {
  /** Defaults to the substrate matching the url scheme. */
  substrate?: KvSubstrate;
  logger?: Logger;
  /** Heartbeat payload bound in bytes, fixed when the bucket is created. */
  maxValueSize?: number;
  timeouts?: Partial<PresenceTimeouts>;
  /** Epoch milliseconds used for heartbeat timestamps. */
  clock?: () => number;
}

export interface ListPresentOptions {
  idleTimeoutMs?: number;
  timeoutMs?: number;
}

export interface PresenceRecord {
  clientId: string;
  /** Unix seconds written by the last heartbeat; `null` when unreadable. */
  lastHeartbeatSec: number | null;
  revision: number;
  created: Date;
}
