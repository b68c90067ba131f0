export type KvErrorCode =
  | "VALUE_TOO_LARGE"
  | "BUCKET_CLOSED"
  | "CONNECTION_CLOSED"
  | "INVALID_CONFIG"
  | "CORRUPT_BUCKET";

export class KvError extends Error {
  constructor(message: string, public readonly code: KvErrorCode) {
    super(message);
    this.name = "KvError";
  }
}
