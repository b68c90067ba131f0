import { loadConfig } from "./config";
import { HeartbeatLoop } from "./presence/heartbeat-loop";
import { initPresenceTracker, type PresenceTracker } from "./presence/presence-tracker";

const config = loadConfig();
const logger = console;

let tracker: PresenceTracker | null = null;
let heartbeats: HeartbeatLoop | null = null;
let listTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function start(): Promise<void> {
  tracker = await initPresenceTracker(
    config.url,
    config.bucket,
    config.clientId,
    config.ttlSeconds,
    { logger }
  );
  logger.info(`Presence agent ${config.clientId} joined bucket ${config.bucket}`, {
    url: config.url,
    ttlSeconds: tracker.ttlSeconds,
  });

  heartbeats = new HeartbeatLoop(tracker, {
    intervalMs: config.heartbeatIntervalMs,
    logger,
  });
  heartbeats.start();

  const active = tracker;
  listTimer = setInterval(() => {
    active
      .listPresent({ idleTimeoutMs: config.listIdleTimeoutMs })
      .then((present) => {
        logger.info(`Present: ${present.length === 0 ? "(none)" : present.join(", ")}`);
      })
      .catch((error) => {
        logger.error("Failed to list present clients", error);
      });
  }, config.listIntervalMs);
}

async function shutdown(): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info("Shutting down presence agent...");

  if (listTimer) {
    clearInterval(listTimer);
    listTimer = null;
  }
  if (heartbeats) {
    await heartbeats.stop();
    heartbeats = null;
  }
  if (tracker) {
    await tracker.close();
    tracker = null;
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown().catch((error) => {
      logger.error("Presence agent shutdown failed", error);
      process.exit(1);
    });
  });
}

start().catch(async (error) => {
  logger.error("Presence agent startup failed", error);
  await tracker?.close();
  process.exit(1);
});
