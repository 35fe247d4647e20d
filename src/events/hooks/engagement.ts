/**
 * Typed hooks for engagement events, published after the write they describe
 * has committed. Delivery is best-effort: listeners cannot fail or delay the
 * operation that emitted them.
 *
 * Each engine owns its own set (`createEngagementHooks`), so two engines in
 * one process never see each other's events.
 */
import type { BadgeAwardDoc } from "@/db/schemas/badge";
import type { CommentDoc, LikeDoc } from "@/db/schemas/interaction";
import type { PointTransactionDoc } from "@/db/schemas/ledger";
import type { MemeDoc } from "@/db/schemas/meme";
import type { RankName } from "@/db/schemas/user";
import type { UserId } from "@/db/types";
import type { BadgeDefinition } from "@/modules/engagement/badges/types";
import { createEventHook, type EventHook } from "./createEventHook";

export type LikeAddedArgs = [like: LikeDoc, meme: MemeDoc];
export type LikeRemovedArgs = [like: LikeDoc, meme: MemeDoc];
export type CommentAddedArgs = [comment: CommentDoc];
export type MemeCreatedArgs = [meme: MemeDoc];
export type PointsRecordedArgs = [transaction: PointTransactionDoc, balance: number];
export type RankChangedArgs = [userId: UserId, from: RankName, to: RankName];
export type BadgeAwardedArgs = [award: BadgeAwardDoc, badge: BadgeDefinition];

export interface EngagementHooks {
  readonly likeAdded: EventHook<LikeAddedArgs>;
  readonly likeRemoved: EventHook<LikeRemovedArgs>;
  readonly commentAdded: EventHook<CommentAddedArgs>;
  readonly memeCreated: EventHook<MemeCreatedArgs>;
  readonly pointsRecorded: EventHook<PointsRecordedArgs>;
  readonly rankChanged: EventHook<RankChangedArgs>;
  readonly badgeAwarded: EventHook<BadgeAwardedArgs>;
}

export function createEngagementHooks(): EngagementHooks {
  return {
    likeAdded: createEventHook<LikeAddedArgs>({ name: "likeAdded" }),
    likeRemoved: createEventHook<LikeRemovedArgs>({ name: "likeRemoved" }),
    commentAdded: createEventHook<CommentAddedArgs>({ name: "commentAdded" }),
    memeCreated: createEventHook<MemeCreatedArgs>({ name: "memeCreated" }),
    pointsRecorded: createEventHook<PointsRecordedArgs>({ name: "pointsRecorded" }),
    rankChanged: createEventHook<RankChangedArgs>({ name: "rankChanged" }),
    badgeAwarded: createEventHook<BadgeAwardedArgs>({ name: "badgeAwarded" }),
  };
}

/** Drop every listener on every hook. */
export function clearEngagementHooks(hooks: EngagementHooks): void {
  for (const hook of Object.values(hooks)) hook.clear();
}
