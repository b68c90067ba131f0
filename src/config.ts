import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "./core/errors";

const ConfigSchema = z.object({
  url: z.string().nonempty().optional(),
  bucket: z.string().nonempty().optional(),
  clientId: z.string().nonempty().optional(),
  ttlSeconds: z.coerce.number().int().positive().optional(),
  heartbeatIntervalMs: z.coerce.number().int().positive().optional(),
  listIntervalMs: z.coerce.number().int().positive().optional(),
  listIdleTimeoutMs: z.coerce.number().int().positive().optional(),
});

const DEFAULT_URL = "nats://localhost:4222";
const DEFAULT_BUCKET = "presence";
const DEFAULT_TTL_SECONDS = 10;
const DEFAULT_LIST_INTERVAL_MS = 5_000;
const DEFAULT_LIST_IDLE_TIMEOUT_MS = 100;

export interface AppConfig {
  url: string;
  bucket: string;
  clientId: string;
  ttlSeconds: number;
  heartbeatIntervalMs: number;
  listIntervalMs: number;
  listIdleTimeoutMs: number;
}

/**
 * Reads the agent configuration from the environment (and `.env`, when
 * `loadDotEnv` is set).
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  { loadDotEnv = env === process.env }: { loadDotEnv?: boolean } = {}
): AppConfig {
  if (loadDotEnv) {
    loadEnv();
  }

  const parsed = ConfigSchema.safeParse({
    url: env.PRESENCE_URL,
    bucket: env.PRESENCE_BUCKET,
    clientId: env.PRESENCE_CLIENT_ID,
    ttlSeconds: env.PRESENCE_TTL_SECONDS,
    heartbeatIntervalMs: env.PRESENCE_HEARTBEAT_INTERVAL_MS,
    listIntervalMs: env.PRESENCE_LIST_INTERVAL_MS,
    listIdleTimeoutMs: env.PRESENCE_LIST_IDLE_TIMEOUT_MS,
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, {
      operation: "loadConfig",
    });
  }

  const values = parsed.data;
  const ttlSeconds = values.ttlSeconds ?? DEFAULT_TTL_SECONDS;

  return {
    url: values.url ?? DEFAULT_URL,
    bucket: values.bucket ?? DEFAULT_BUCKET,
    clientId: values.clientId ?? `agent_${process.pid}`,
    ttlSeconds,
    heartbeatIntervalMs: values.heartbeatIntervalMs ?? Math.floor((ttlSeconds * 1000) / 2),
    listIntervalMs: values.listIntervalMs ?? DEFAULT_LIST_INTERVAL_MS,
    listIdleTimeoutMs: values.listIdleTimeoutMs ?? DEFAULT_LIST_IDLE_TIMEOUT_MS,
  };
}
