/**
 * Trending Service.
 *
 * Score of a meme over a window = likes × like weight + comments × comment
 * weight, counting likes that still exist and comments created in the
 * half-open window `[start, end)`.
 *
 * Named windows (`24h`, `7d`) are materialized views kept current two ways:
 * - incrementally, by `onLikeAdded` / `onLikeRemoved` / `onCommentAdded`;
 * - by `refresh`, which recounts from the interaction tables into a fresh
 *   view and swaps it in whole, unless aborted first.
 * For a fixed window start both paths yield the same counts. A read that
 * finds the view older than `maxViewAgeMs` rebuilds it first, so the window
 * keeps sliding without the background loop. Explicit `{ start, end }`
 * windows are computed directly from the tables.
 *
 * Nothing here writes users or memes.
 */
import type { MemeId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { EngagementError, storeUnavailable } from "../errors";
import type { InteractionsRepository } from "../interactions/repository";
import type { Comment, Like, TimeWindow, WindowCounts } from "../interactions/types";
import type { MemesRepository } from "../memes/repository";
import type { TrendingViewRepository } from "./repository";
import { rankTrending } from "./scoring";
import {
  TRENDING_WINDOWS,
  TRENDING_WINDOW_KEYS,
  type RefreshOutcome,
  type TrendingCounts,
  type TrendingMeme,
  type TrendingWeights,
  type TrendingWindowKey,
} from "./types";

export const DEFAULT_TRENDING_LIMIT = 20;

export interface TrendingServiceDeps {
  readonly views: TrendingViewRepository;
  readonly interactions: InteractionsRepository;
  readonly memes: MemesRepository;
  readonly weights: TrendingWeights;
  /** Age after which a read rebuilds a named view. */
  readonly maxViewAgeMs: number;
  readonly clock: () => Date;
}

export interface RefreshOptions {
  readonly signal?: AbortSignal;
}

export const isTrendingWindowKey = (value: string): value is TrendingWindowKey =>
  Object.hasOwn(TRENDING_WINDOWS, value);

export class TrendingService {
  constructor(private readonly deps: TrendingServiceDeps) {}

  async trending(
    window: TrendingWindowKey | TimeWindow,
    limit: number = DEFAULT_TRENDING_LIMIT,
  ): Promise<Result<TrendingMeme[], EngagementError>> {
    const countsRes =
      typeof window === "string"
        ? await this.viewCounts(window)
        : await this.windowCounts(window);
    if (countsRes.isErr()) return ErrResult(countsRes.error);

    const ranked = rankTrending(countsRes.unwrap(), this.deps.weights, limit);
    const memesRes = await this.deps.memes.getMany(ranked.map((entry) => entry.memeId));
    if (memesRes.isErr()) return ErrResult(storeUnavailable("Trending", memesRes.error));
    const memes = new Map(memesRes.unwrap().map((meme) => [meme._id, meme]));

    const result: TrendingMeme[] = [];
    for (const entry of ranked) {
      const meme = memes.get(entry.memeId);
      if (meme) result.push({ ...entry, meme });
    }
    return OkResult(result);
  }

  /** Rebuild one named view. An aborted rebuild leaves the stored view as it was. */
  async refresh(
    key: TrendingWindowKey,
    options: RefreshOptions = {},
  ): Promise<Result<RefreshOutcome, EngagementError>> {
    if (options.signal?.aborted) return OkResult({ status: "aborted" });

    const builtAt = this.deps.clock();
    const start = new Date(builtAt.getTime() - TRENDING_WINDOWS[key]);
    const countsRes = await this.deps.interactions.countInWindow({ start });
    if (countsRes.isErr()) {
      return ErrResult(storeUnavailable("Trending.refresh", countsRes.error));
    }

    if (options.signal?.aborted) return OkResult({ status: "aborted" });

    const view = { _id: key, start, builtAt, scores: countsRes.unwrap() };
    const saved = await this.deps.views.replaceView(view);
    if (saved.isErr()) return ErrResult(storeUnavailable("Trending.refresh", saved.error));
    return OkResult({ status: "swapped", view });
  }

  async refreshAll(
    options: RefreshOptions = {},
  ): Promise<Result<RefreshOutcome[], EngagementError>> {
    const outcomes: RefreshOutcome[] = [];
    for (const key of TRENDING_WINDOW_KEYS) {
      const res = await this.refresh(key, options);
      if (res.isErr()) return ErrResult(res.error);
      outcomes.push(res.unwrap());
    }
    return OkResult(outcomes);
  }

  onLikeAdded(like: Like): Promise<Result<void, EngagementError>> {
    return this.applyDelta(like.memeId, { likes: 1, comments: 0 }, like.createdAt);
  }

  /** Keyed on the like's own creation time: only likes the view counted come off. */
  onLikeRemoved(like: Like): Promise<Result<void, EngagementError>> {
    return this.applyDelta(like.memeId, { likes: -1, comments: 0 }, like.createdAt);
  }

  onCommentAdded(comment: Comment): Promise<Result<void, EngagementError>> {
    return this.applyDelta(comment.memeId, { likes: 0, comments: 1 }, comment.createdAt);
  }

  private async applyDelta(
    memeId: MemeId,
    delta: TrendingCounts,
    eventAt: Date,
  ): Promise<Result<void, EngagementError>> {
    for (const key of TRENDING_WINDOW_KEYS) {
      const res = await this.deps.views.applyDelta(key, memeId, delta, eventAt);
      if (res.isErr()) return ErrResult(storeUnavailable("Trending.applyDelta", res.error));
    }
    return OkResult(undefined);
  }

  private async viewCounts(
    key: TrendingWindowKey,
  ): Promise<Result<WindowCounts, EngagementError>> {
    const res = await this.deps.views.getView(key);
    if (res.isErr()) return ErrResult(storeUnavailable("Trending", res.error));
    const view = res.unwrap();
    const now = this.deps.clock().getTime();
    if (view && now - view.builtAt.getTime() < this.deps.maxViewAgeMs) {
      return OkResult(view.scores);
    }

    // Missing or stale: build it now.
    const built = await this.refresh(key);
    if (built.isErr()) return ErrResult(built.error);
    const outcome = built.unwrap();
    return OkResult(outcome.status === "swapped" ? outcome.view.scores : {});
  }

  private async windowCounts(
    window: TimeWindow,
  ): Promise<Result<WindowCounts, EngagementError>> {
    if (window.end && window.end.getTime() <= window.start.getTime()) {
      return ErrResult(
        new EngagementError("INVALID_INPUT", "Trending window must end after it starts"),
      );
    }
    const res = await this.deps.interactions.countInWindow(window);
    if (res.isErr()) return ErrResult(storeUnavailable("Trending", res.error));
    return OkResult(res.unwrap());
  }
}
