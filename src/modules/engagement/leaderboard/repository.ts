/**
 * Trending View Repository.
 *
 * A view is one document per window key. A rebuild replaces the document in
 * one write, so readers see either the old view or the new one. Incremental
 * deltas only touch a view whose `start` is not after the event.
 */
import { toError } from "@/db/helpers";
import { getDb } from "@/db/mongo";
import { MongoStore } from "@/db/mongo-store";
import { TrendingViewSchema, type TrendingViewDoc } from "@/db/schemas/trending";
import type { MemeId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { TrendingCounts, TrendingView } from "./types";

export const TRENDING_COLLECTION = "trending_views";
export const TrendingStore = new MongoStore<TrendingViewDoc>(
  TRENDING_COLLECTION,
  TrendingViewSchema,
);

export interface TrendingViewRepository {
  getView(key: string): Promise<Result<TrendingView | null, Error>>;
  /** Swap in a complete view. */
  replaceView(view: TrendingView): Promise<Result<void, Error>>;
  /**
   * Add `delta` to one meme's counts. `Ok(false)` when there is no view yet
   * or the event predates the view's window.
   */
  applyDelta(
    key: string,
    memeId: MemeId,
    delta: TrendingCounts,
    eventAt: Date,
  ): Promise<Result<boolean, Error>>;
}

class TrendingViewRepositoryImpl implements TrendingViewRepository {
  getView(key: string): Promise<Result<TrendingView | null, Error>> {
    return TrendingStore.get(key);
  }

  async replaceView(view: TrendingView): Promise<Result<void, Error>> {
    try {
      const col = await TrendingStore.collection();
      await col.replaceOne({ _id: view._id }, view, { upsert: true });
      return OkResult(undefined);
    } catch (error) {
      console.error("[TrendingViewRepository] replaceView error:", error);
      return ErrResult(toError(error));
    }
  }

  async applyDelta(
    key: string,
    memeId: MemeId,
    delta: TrendingCounts,
    eventAt: Date,
  ): Promise<Result<boolean, Error>> {
    try {
      // Score paths are keyed by meme id, so this goes through the untyped handle.
      const col = (await getDb()).collection<{ _id: string }>(TRENDING_COLLECTION);
      const res = await col.updateOne(
        { _id: key, start: { $lte: eventAt } },
        {
          $inc: {
            [`scores.${memeId}.likes`]: delta.likes,
            [`scores.${memeId}.comments`]: delta.comments,
          },
        },
      );
      return OkResult(res.matchedCount === 1);
    } catch (error) {
      console.error("[TrendingViewRepository] applyDelta error:", error);
      return ErrResult(toError(error));
    }
  }
}

export const trendingViewRepository: TrendingViewRepository =
  new TrendingViewRepositoryImpl();
