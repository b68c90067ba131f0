import { z } from "zod";

import { ConfigurationError } from "../core/errors";
import type { PresenceTimeouts } from "./types";

export const DEFAULT_TTL_SECONDS = 10;
export const DEFAULT_MAX_VALUE_SIZE = 256;

export const DEFAULT_TIMEOUTS: PresenceTimeouts = {
  connectMs: 5_000,
  heartbeatMs: 5_000,
  checkMs: 5_000,
  listMs: 5_000,
  listIdleMs: 100,
  closeMs: 2_000,
};

const bucketNamePattern = /^[-\w]+$/;
const clientIdPattern = /^[-/=\w]+(?:\.[-/=\w]+)*$/;

export const ClientIdSchema = z
  .string()
  .min(1, "must not be empty")
  .regex(clientIdPattern, "may only contain letters, digits, '-', '_', '/', '=' and inner dots");

const PresenceSettingsSchema = z.object({
  url: z.string().min(1, "must not be empty"),
  bucketName: z
    .string()
    .min(1, "must not be empty")
    .regex(bucketNamePattern, "may only contain letters, digits, '-' and '_'"),
  clientId: ClientIdSchema,
  ttlSeconds: z.number().int("must be a whole number of seconds").positive("must be positive"),
  maxValueSize: z.number().int("must be a whole number of bytes").positive("must be positive"),
});

export type PresenceSettings = z.infer<typeof PresenceSettingsSchema>;

const TimeoutsSchema = z
  .object({
    connectMs: z.number().int().positive(),
    heartbeatMs: z.number().int().positive(),
    checkMs: z.number().int().positive(),
    listMs: z.number().int().positive(),
    listIdleMs: z.number().int().positive(),
    closeMs: z.number().int().positive(),
  })
  .partial();

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".")} ${issue.message}`.trim())
    .join("; ");

export function parsePresenceSettings(input: PresenceSettings): PresenceSettings {
  const parsed = PresenceSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid presence tracker configuration: ${formatIssues(parsed.error)}`,
      { operation: "initialize", bucket: input.bucketName }
    );
  }
  return parsed.data;
}

export function resolveTimeouts(overrides: Partial<PresenceTimeouts> = {}): PresenceTimeouts {
  const parsed = TimeoutsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid presence timeouts: ${formatIssues(parsed.error)}`);
  }
  const timeouts = parsed.data;
  return {
    connectMs: timeouts.connectMs ?? DEFAULT_TIMEOUTS.connectMs,
    heartbeatMs: timeouts.heartbeatMs ?? DEFAULT_TIMEOUTS.heartbeatMs,
    checkMs: timeouts.checkMs ?? DEFAULT_TIMEOUTS.checkMs,
    listMs: timeouts.listMs ?? DEFAULT_TIMEOUTS.listMs,
    listIdleMs: timeouts.listIdleMs ?? DEFAULT_TIMEOUTS.listIdleMs,
    closeMs: timeouts.closeMs ?? DEFAULT_TIMEOUTS.closeMs,
  };
}

export function assertClientId(clientId: string, operation: string): void {
  const parsed = ClientIdSchema.safeParse(clientId);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid client id "${clientId}": ${formatIssues(parsed.error)}`,
      { operation }
    );
  }
}
