export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface OperationOptions {
  timeoutMs?: number;
}
