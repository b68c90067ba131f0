export { TraceService, DEFAULT_TRACER_NAME } from "./trace-service";
export {
  InstrumentedPresenceTracker,
  initInstrumentedPresenceTracker,
} from "./instrumented-tracker";
export type { InstrumentedPresenceTrackerOptions } from "./instrumented-tracker";
export type { PresenceOperation, PresenceSpanAttributes } from "./types";
