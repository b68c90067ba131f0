export type PresenceOperation =
  | "initialize"
  | "heartbeat"
  | "is_present"
  | "last_heartbeat"
  | "list_present"
  | "close";

/**
 * Span attributes for presence operations
 */
export interface PresenceSpanAttributes {
  "presence.operation": PresenceOperation;
  "presence.bucket": string;
  "presence.client_id": string;
  "presence.target_client_id": string;
  "presence.result": boolean;
  "presence.count": number;
  "presence.ttl_ms": number;
}
