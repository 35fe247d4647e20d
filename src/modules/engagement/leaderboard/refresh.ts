/**
 * Background refresh loop for the named trending views.
 *
 * One rebuild runs at a time; a tick that lands while the previous rebuild is
 * still running is skipped. `stop()` clears the timer and aborts the rebuild
 * in flight, which then leaves the previous views in place.
 */
import type { TrendingService } from "./trending";

export interface TrendingRefreshOptions {
  readonly intervalMs: number;
  /** Also rebuild once right away. */
  readonly runImmediately?: boolean;
}

export interface TrendingRefreshHandle {
  stop(): void;
  /** Resolves when the rebuild in flight (if any) has finished. */
  idle(): Promise<void>;
}

export function startTrendingRefresh(
  trending: TrendingService,
  options: TrendingRefreshOptions,
): TrendingRefreshHandle {
  let controller: AbortController | null = null;
  let running: Promise<void> | null = null;
  let stopped = false;

  const tick = (): void => {
    if (stopped || running) return;
    const current = new AbortController();
    controller = current;
    running = trending
      .refreshAll({ signal: current.signal })
      .then((res) => {
        if (res.isErr()) {
          console.error("[Trending] refresh failed:", res.error);
        }
      })
      .catch((error: unknown) => {
        console.error("[Trending] refresh crashed:", error);
      })
      .finally(() => {
        running = null;
        if (controller === current) controller = null;
      });
  };

  console.log(`[Trending] refresh loop started (every ${options.intervalMs}ms)`);
  const timer = setInterval(tick, options.intervalMs);
  timer.unref();
  if (options.runImmediately) tick();

  return {
    stop: () => {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      controller?.abort();
      console.log("[Trending] refresh loop stopped");
    },
    idle: () => running ?? Promise.resolve(),
  };
}
