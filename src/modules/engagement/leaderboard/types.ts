import type { RankName } from "@/db/schemas/user";
import type { TrendingCounts, TrendingViewDoc } from "@/db/schemas/trending";
import type { MemeId, UserId } from "@/db/types";
import type { Meme } from "../memes/types";

export type { TrendingCounts };
export type { TrendingWeights } from "@/configuration/definitions";
export type TrendingView = TrendingViewDoc;

export const TRENDING_WINDOWS = {
  "24h": 24 * 60 * 60 * 1000,
  "7d": 7 * 24 * 60 * 60 * 1000,
} as const;

export type TrendingWindowKey = keyof typeof TRENDING_WINDOWS;
export const TRENDING_WINDOW_KEYS: readonly TrendingWindowKey[] = ["24h", "7d"];

export interface TrendingScore {
  readonly memeId: MemeId;
  readonly likes: number;
  readonly comments: number;
  readonly score: number;
}

export interface TrendingMeme extends TrendingScore {
  readonly meme: Meme;
}

export interface LeaderboardEntry {
  /** 1-based. */
  readonly position: number;
  readonly userId: UserId;
  readonly displayName: string;
  readonly totalPoints: number;
  readonly rank: RankName;
}

export type RefreshOutcome =
  | { status: "swapped"; view: TrendingView }
  | { status: "aborted" };
