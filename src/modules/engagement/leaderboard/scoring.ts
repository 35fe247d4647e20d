/**
 * Trending score math. Pure; shared by the incremental and rebuild paths so
 * both read a view the same way.
 */
import type { MemeId } from "@/db/types";
import type { TrendingCounts, TrendingScore, TrendingWeights } from "./types";

export function trendingScore(counts: TrendingCounts, weights: TrendingWeights): number {
  return counts.likes * weights.like + counts.comments * weights.comment;
}

/**
 * Score desc, meme id asc on ties. Memes without any activity in the window
 * are left out.
 */
export function rankTrending(
  scores: Readonly<Record<MemeId, TrendingCounts>>,
  weights: TrendingWeights,
  limit: number,
): TrendingScore[] {
  const ranked: TrendingScore[] = [];
  for (const [memeId, counts] of Object.entries(scores)) {
    if (counts.likes <= 0 && counts.comments <= 0) continue;
    ranked.push({
      memeId,
      likes: counts.likes,
      comments: counts.comments,
      score: trendingScore(counts, weights),
    });
  }
  ranked.sort(
    (a, b) =>
      b.score - a.score || (a.memeId < b.memeId ? -1 : a.memeId > b.memeId ? 1 : 0),
  );
  return ranked.slice(0, Math.max(0, limit));
}
