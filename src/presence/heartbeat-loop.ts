import { ConfigurationError, describeError } from "../core/errors";
import type { Logger } from "../core/types";
import type { PresenceTracker } from "./presence-tracker";

export type HeartbeatTarget = Pick<PresenceTracker, "sendHeartbeat" | "ttlMs" | "clientId">;

export interface HeartbeatLoopOptions {
  /** Must stay below the bucket TTL, or presence flickers between beats. */
  intervalMs: number;
  /** Send the first heartbeat on `start()` instead of after one interval. */
  immediate?: boolean;
  /** Per-heartbeat timeout handed to `sendHeartbeat`. */
  timeoutMs?: number;
  onError?: (error: unknown) => void;
  logger?: Logger;
}

/**
 * Caller-owned heartbeat repetition. Nothing starts until `start()`, a beat
 * is skipped while the previous one is still in flight, and failures are
 * reported through `onError` and the logger rather than thrown.
 */
export class HeartbeatLoop {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly logger: Logger;
  private beats = 0;
  private failures = 0;

  constructor(
    private readonly target: HeartbeatTarget,
    private readonly options: HeartbeatLoopOptions
  ) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new ConfigurationError(
        `Heartbeat interval must be a positive whole number of milliseconds, got ${options.intervalMs}`,
        { operation: "heartbeatLoop" }
      );
    }
    if (options.intervalMs >= target.ttlMs) {
      throw new ConfigurationError(
        `Heartbeat interval ${options.intervalMs}ms must be shorter than the bucket TTL of ${target.ttlMs}ms`,
        { operation: "heartbeatLoop" }
      );
    }
    this.logger = options.logger ?? console;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get stats(): { beats: number; failures: number } {
    return { beats: this.beats, failures: this.failures };
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    if (typeof this.timer.unref === "function") {
      this.timer.unref();
    }
    if (this.options.immediate ?? true) {
      this.tick();
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (this.inFlight) {
      return;
    }

    const beat = this.options.timeoutMs === undefined
      ? this.target.sendHeartbeat()
      : this.target.sendHeartbeat({ timeoutMs: this.options.timeoutMs });

    this.inFlight = beat
      .then(() => {
        this.beats += 1;
      })
      .catch((error: unknown) => {
        this.failures += 1;
        this.logger.error("Presence heartbeat failed", {
          clientId: this.target.clientId,
          error: describeError(error),
        });
        try {
          this.options.onError?.(error);
        } catch (handlerError) {
          this.logger.error("Heartbeat error handler threw", handlerError);
        }
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
