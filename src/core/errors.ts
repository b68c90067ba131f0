export type PresenceErrorCode =
  | "CONFIGURATION"
  | "CONNECTION"
  | "BUCKET"
  | "HEARTBEAT"
  | "PRESENCE_CHECK"
  | "TIMEOUT";

export interface PresenceErrorContext {
  operation: string;
  bucket?: string;
  key?: string;
  cause?: unknown;
}

export class PresenceError extends Error {
  readonly operation: string;
  readonly bucket: string | undefined;
  readonly key: string | undefined;

  constructor(
    message: string,
    public readonly code: PresenceErrorCode,
    context: PresenceErrorContext
  ) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "PresenceError";
    this.operation = context.operation;
    this.bucket = context.bucket;
    this.key = context.key;
  }
}

export class ConfigurationError extends PresenceError {
  constructor(message: string, context: PresenceErrorContext = { operation: "configure" }) {
    super(message, "CONFIGURATION", context);
    this.name = "ConfigurationError";
  }
}

export class ConnectionError extends PresenceError {
  constructor(message: string, context: PresenceErrorContext) {
    super(message, "CONNECTION", context);
    this.name = "ConnectionError";
  }
}

export class BucketError extends PresenceError {
  constructor(message: string, context: PresenceErrorContext) {
    super(message, "BUCKET", context);
    this.name = "BucketError";
  }
}

export class HeartbeatError extends PresenceError {
  constructor(message: string, context: PresenceErrorContext) {
    super(message, "HEARTBEAT", context);
    this.name = "HeartbeatError";
  }
}

export class PresenceCheckError extends PresenceError {
  constructor(message: string, context: PresenceErrorContext) {
    super(message, "PRESENCE_CHECK", context);
    this.name = "PresenceCheckError";
  }
}

export class PresenceTimeoutError extends PresenceError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    context: PresenceErrorContext
  ) {
    super(message, "TIMEOUT", context);
    this.name = "PresenceTimeoutError";
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
};
