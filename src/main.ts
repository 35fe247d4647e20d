/**
 * Standalone process: initializes the engine, keeps the trending views fresh
 * and logs engagement events until interrupted.
 */
import { initEngagement } from "@/modules/engagement";

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting engagement engine...");
  const runtime = await initEngagement();
  const { hooks } = runtime.engine;

  hooks.badgeAwarded.on((award, badge) => {
    console.log(`[bootstrap] ${award.userId} earned ${badge.id}`);
  });
  hooks.rankChanged.on((userId, from, to) => {
    console.log(`[bootstrap] ${userId} moved from ${from} to ${to}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`[bootstrap] ${signal} received, shutting down`);
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[bootstrap] Failed to stop cleanly:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start engagement engine:", error);
  process.exitCode = 1;
});
