export {
  PresenceTracker,
  initPresenceTracker,
  withPresenceTracker,
  openPresenceHandles,
  resolveTrackerConfig,
} from "./presence-tracker";
export type { PresenceHandles, ResolvedTrackerConfig } from "./presence-tracker";
export { HeartbeatLoop } from "./heartbeat-loop";
export type { HeartbeatLoopOptions, HeartbeatTarget } from "./heartbeat-loop";
export {
  DEFAULT_MAX_VALUE_SIZE,
  DEFAULT_TIMEOUTS,
  DEFAULT_TTL_SECONDS,
} from "./settings";
export type { PresenceSettings } from "./settings";
export type {
  ListPresentOptions,
  PresenceRecord,
  PresenceTimeouts,
  PresenceTrackerOptions,
} from "./types";
export * as presenceKeys from "./keys";
