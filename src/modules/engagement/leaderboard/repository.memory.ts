import { deepClone, ownValue } from "@/db/helpers";
import type { MemoryDatabase } from "@/db/memory";
import type { MemeId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { TrendingViewRepository } from "./repository";
import type { TrendingCounts, TrendingView } from "./types";

export class MemoryTrendingViewRepository implements TrendingViewRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async getView(key: string): Promise<Result<TrendingView | null, Error>> {
    return OkResult(deepClone(this.db.trendingViews.get(key) ?? null));
  }

  async replaceView(view: TrendingView): Promise<Result<void, Error>> {
    this.db.trendingViews.set(view._id, deepClone(view));
    return OkResult(undefined);
  }

  async applyDelta(
    key: string,
    memeId: MemeId,
    delta: TrendingCounts,
    eventAt: Date,
  ): Promise<Result<boolean, Error>> {
    const view = this.db.trendingViews.get(key);
    if (!view || view.start.getTime() > eventAt.getTime()) return OkResult(false);

    const current = ownValue(view.scores, memeId) ?? { likes: 0, comments: 0 };
    view.scores = {
      ...view.scores,
      [memeId]: {
        likes: current.likes + delta.likes,
        comments: current.comments + delta.comments,
      },
    };
    return OkResult(true);
  }
}
