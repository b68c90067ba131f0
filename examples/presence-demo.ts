import { loadConfig } from "../src/config";
import { withPresenceTracker, type PresenceTracker } from "../src/presence/presence-tracker";

const logger = console;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function activePhase(tracker: PresenceTracker, intervalMs: number): Promise<void> {
  logger.info("Phase 1: active heartbeats");
  for (let round = 1; round <= 6; round += 1) {
    await tracker.sendHeartbeat();
    const present = await tracker.listPresent();
    logger.info(`Sent heartbeat #${round}; present: ${present.join(", ") || "(none)"}`);
    await sleep(intervalMs);
  }
}

async function expiryPhase(tracker: PresenceTracker, intervalMs: number): Promise<void> {
  logger.info(`Phase 2: heartbeats stopped, waiting for the ${tracker.ttlSeconds}s TTL to lapse`);
  logger.info(`${tracker.clientId} present: ${await tracker.isPresent(tracker.clientId)}`);

  for (let round = 1; round <= 3; round += 1) {
    await sleep(intervalMs);
    const present = await tracker.isPresent(tracker.clientId);
    logger.info(`After ${(round * intervalMs) / 1000}s without heartbeat, present: ${present}`);
    if (!present) {
      logger.info("Presence expired");
      return;
    }
  }
  logger.warn("Presence outlived the wait; the bucket may have a longer TTL");
}

async function resumePhase(tracker: PresenceTracker, intervalMs: number): Promise<void> {
  logger.info("Phase 3: resuming heartbeats");
  for (let round = 1; round <= 3; round += 1) {
    await tracker.sendHeartbeat();
    logger.info(`Sent heartbeat #${round}; present again: ${await tracker.isPresent(tracker.clientId)}`);
    await sleep(intervalMs);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();

  await withPresenceTracker(
    config.url,
    config.bucket,
    config.clientId,
    config.ttlSeconds,
    async (tracker) => {
      logger.info(`Tracking presence for ${tracker.clientId} in bucket ${tracker.bucketName}`);
      await activePhase(tracker, config.heartbeatIntervalMs);
      await expiryPhase(tracker, tracker.ttlMs / 2);
      await resumePhase(tracker, config.heartbeatIntervalMs);
    },
    { logger }
  );

  logger.info("Presence demo completed");
}

main().catch((error) => {
  logger.error("Presence demo failed", error);
  process.exitCode = 1;
});
