import type { OperationOptions } from "../core/types";
import { resolveSubstrate } from "../kv/resolve-substrate";
import {
  PresenceTracker,
  openPresenceHandles,
  resolveTrackerConfig,
  type PresenceHandles,
  type ResolvedTrackerConfig,
} from "../presence/presence-tracker";
import { DEFAULT_TTL_SECONDS } from "../presence/settings";
import type {
  ListPresentOptions,
  PresenceRecord,
  PresenceTrackerOptions,
} from "../presence/types";
import { TraceService } from "./trace-service";

/**
 * PresenceTracker with a span around every operation
 */
export class InstrumentedPresenceTracker extends PresenceTracker {
  constructor(
    handles: PresenceHandles,
    config: ResolvedTrackerConfig,
    private readonly traceService: TraceService = new TraceService()
  ) {
    super(handles, config);
  }

  async sendHeartbeat(options: OperationOptions = {}): Promise<void> {
    return this.traceService.tracePresenceOperation(
      "heartbeat",
      this.baseAttributes(),
      async () => {
        await super.sendHeartbeat(options);
        this.traceService.addEvent("presence.heartbeat_sent", {
          client_id: this.clientId,
        });
      }
    );
  }

  async isPresent(clientId: string, options: OperationOptions = {}): Promise<boolean> {
    return this.traceService.tracePresenceOperation(
      "is_present",
      { ...this.baseAttributes(), "presence.target_client_id": clientId },
      async (span) => {
        const present = await super.isPresent(clientId, options);
        span.setAttribute("presence.result", present);
        return present;
      }
    );
  }

  async lastHeartbeat(
    clientId: string,
    options: OperationOptions = {}
  ): Promise<PresenceRecord | null> {
    return this.traceService.tracePresenceOperation(
      "last_heartbeat",
      { ...this.baseAttributes(), "presence.target_client_id": clientId },
      async (span) => {
        const record = await super.lastHeartbeat(clientId, options);
        span.setAttribute("presence.result", record !== null);
        return record;
      }
    );
  }

  async listPresent(options: ListPresentOptions = {}): Promise<string[]> {
    return this.traceService.tracePresenceOperation(
      "list_present",
      this.baseAttributes(),
      async (span) => {
        const clientIds = await super.listPresent(options);
        span.setAttribute("presence.count", clientIds.length);
        return clientIds;
      }
    );
  }

  async close(options: OperationOptions = {}): Promise<void> {
    return this.traceService.tracePresenceOperation("close", this.baseAttributes(), () =>
      super.close(options)
    );
  }

  private baseAttributes() {
    return {
      "presence.bucket": this.bucketName,
      "presence.client_id": this.clientId,
      "presence.ttl_ms": this.ttlMs,
    };
  }
}

export interface InstrumentedPresenceTrackerOptions extends PresenceTrackerOptions {
  traceService?: TraceService;
}

export async function initInstrumentedPresenceTracker(
  url: string,
  bucketName: string,
  clientId: string,
  ttlSeconds: number = DEFAULT_TTL_SECONDS,
  options: InstrumentedPresenceTrackerOptions = {}
): Promise<InstrumentedPresenceTracker> {
  const traceService = options.traceService ?? new TraceService();
  const config = resolveTrackerConfig(url, bucketName, clientId, ttlSeconds, options);
  const substrate = options.substrate ?? resolveSubstrate(config.settings.url);

  const handles = await traceService.tracePresenceOperation(
    "initialize",
    { "presence.bucket": bucketName, "presence.client_id": clientId },
    () => openPresenceHandles(config, substrate)
  );
  return new InstrumentedPresenceTracker(handles, config, traceService);
}
