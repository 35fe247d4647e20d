/**
 * Engagement module initialization.
 *
 * One-time setup: resolve configuration, prepare the store and build the
 * engine. Call once during startup before handling requests.
 *
 * ```typescript
 * const { engine, stop } = await initEngagement();
 * await engine.addLike("alice", "meme-1");
 * await stop();
 * ```
 */
import { loadEngagementConfig, type EngagementConfig } from "@/configuration";
import { ensureEngagementIndexes } from "@/db/indexes";
import { closeDb } from "@/db/mongo";
import { createEngagementEngine, type EngagementEngine, type EngagementEngineOptions } from "./engine";
import type { TrendingRefreshHandle } from "./leaderboard/refresh";

export interface EngagementInitOptions extends Omit<EngagementEngineOptions, "config"> {
  /** Defaults to `loadEngagementConfig()` over the process environment. */
  config?: EngagementConfig;
  /** Skip index creation (mongo backend only). */
  skipIndexes?: boolean;
  /** Start the periodic trending rebuild (default: true). */
  startRefreshLoop?: boolean;
}

export interface EngagementRuntime {
  readonly engine: EngagementEngine;
  /** Stops the refresh loop and closes the store connection. */
  stop(): Promise<void>;
}

export async function initEngagement(
  options: EngagementInitOptions = {},
): Promise<EngagementRuntime> {
  const { skipIndexes = false, startRefreshLoop = true, ...engineOptions } = options;

  console.log("[Engagement] Initializing engagement module...");

  let config = options.config;
  if (!config) {
    const loaded = loadEngagementConfig();
    if (loaded.isErr()) {
      console.error("[Engagement] Invalid configuration:", loaded.error.message);
      throw loaded.error;
    }
    config = loaded.unwrap();
  }

  const engine = createEngagementEngine({ ...engineOptions, config });
  const usesMongo = config.store === "mongo" && !options.repositories;

  if (usesMongo && !skipIndexes) {
    // Uniqueness guarantees live in these indexes; refuse to start without them.
    await ensureEngagementIndexes();
  } else if (usesMongo) {
    console.log("[Engagement] Skipping index creation (skipIndexes=true)");
  }

  let loop: TrendingRefreshHandle | null = null;
  if (startRefreshLoop) {
    loop = engine.startTrendingRefresh({ runImmediately: true });
  }

  console.log(`[Engagement] Engagement module initialized (store: ${config.store})`);

  return {
    engine,
    async stop() {
      if (loop) {
        loop.stop();
        await loop.idle();
      }
      if (usesMongo) await closeDb();
      console.log("[Engagement] Engagement module stopped");
    },
  };
}
