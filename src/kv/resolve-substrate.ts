import { ConfigurationError } from "../core/errors";
import { MemoryKvSubstrate } from "./memory-substrate";
import { NatsKvSubstrate } from "./nats-substrate";
import { RedisKvSubstrate } from "./redis-substrate";
import type { KvSubstrate } from "./types";

const NATS_SCHEMES = new Set(["nats:", "tls:", "ws:", "wss:"]);
const REDIS_SCHEMES = new Set(["redis:", "rediss:"]);

/** Picks the substrate that serves a connection URL, by scheme. */
export function resolveSubstrate(url: string): KvSubstrate {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch (_error) {
    throw new ConfigurationError(`Invalid connection url: ${url}`);
  }

  if (NATS_SCHEMES.has(protocol)) {
    return new NatsKvSubstrate();
  }
  if (REDIS_SCHEMES.has(protocol)) {
    return new RedisKvSubstrate();
  }
  if (protocol === "memory:") {
    return new MemoryKvSubstrate();
  }

  throw new ConfigurationError(`Unsupported connection url scheme "${protocol}" in ${url}`);
}
