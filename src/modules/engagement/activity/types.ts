import type { ActivityDoc, ActivityKind, ActivityMetadata } from "@/db/schemas/activity";
import type { UserId } from "@/db/types";

export type { ActivityKind, ActivityMetadata };
export type Activity = ActivityDoc;

export interface AppendActivityInput {
  readonly userId: UserId;
  readonly kind: ActivityKind;
  /** Id of the meme, like, comment, transaction or badge the entry is about. */
  readonly reference: string;
  readonly metadata?: ActivityMetadata;
  /**
   * Stable id derived from the source event. Appending the same key twice
   * returns the first entry, which makes whole-operation retries safe.
   */
  readonly key?: string;
}

export const activityKeys = {
  memeCreated: (memeId: string) => `meme_created:${memeId}`,
  likeAdded: (likeId: string) => `like_added:${likeId}`,
  likeRemoved: (likeId: string) => `like_removed:${likeId}`,
  commentAdded: (commentId: string) => `comment_added:${commentId}`,
  dailyLogin: (userId: string, day: string) => `daily_login:${userId}:${day}`,
  bonusAwarded: (transactionId: string) => `bonus_awarded:${transactionId}`,
  milestoneReached: (transactionId: string) => `milestone_reached:${transactionId}`,
  rankChanged: (transactionId: string) => `rank_changed:${transactionId}`,
  badgeAwarded: (awardId: string) => `badge_awarded:${awardId}`,
} as const;
