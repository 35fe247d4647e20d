/**
 * In-process document store backing the `memory` backend and the test suite.
 *
 * Each repository reads and writes these maps inside a single synchronous
 * block, so a repository call is atomic with respect to every other call on
 * the event loop. Secondary maps stand in for the unique indexes MongoDB
 * enforces (`likeByPair`, `transactionByKey`). Records are cloned on the way
 * in and out.
 */
import type { ActivityDoc } from "./schemas/activity";
import type { BadgeAwardDoc } from "./schemas/badge";
import type { CommentDoc, LikeDoc } from "./schemas/interaction";
import type { PointTransactionDoc } from "./schemas/ledger";
import type { MemeDoc } from "./schemas/meme";
import type { TrendingViewDoc } from "./schemas/trending";
import type { UserDoc } from "./schemas/user";

export const likePairKey = (userId: string, memeId: string): string =>
  `${userId}:${memeId}`;

/** Newest first; id breaks ties between rows written in the same millisecond. */
export function compareNewestFirst<T extends { _id: string; createdAt: Date }>(
  a: T,
  b: T,
): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a._id < b._id ? 1 : a._id > b._id ? -1 : 0;
}

export class MemoryDatabase {
  readonly users = new Map<string, UserDoc>();
  readonly memes = new Map<string, MemeDoc>();
  readonly likes = new Map<string, LikeDoc>();
  readonly likeByPair = new Map<string, string>();
  readonly comments = new Map<string, CommentDoc>();
  readonly transactions = new Map<string, PointTransactionDoc>();
  readonly transactionByKey = new Map<string, string>();
  readonly awards = new Map<string, BadgeAwardDoc>();
  readonly activities = new Map<string, ActivityDoc>();
  readonly trendingViews = new Map<string, TrendingViewDoc>();

  /** Drop every record. */
  reset(): void {
    this.users.clear();
    this.memes.clear();
    this.likes.clear();
    this.likeByPair.clear();
    this.comments.clear();
    this.transactions.clear();
    this.transactionByKey.clear();
    this.awards.clear();
    this.activities.clear();
    this.trendingViews.clear();
  }
}
