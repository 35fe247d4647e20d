/**
 * Point policy: amounts per reason and the idempotency key of each
 * originating action.
 *
 * Keys are derived from the source record's id (or the calendar day for
 * logins), so a retried or duplicated upstream call maps onto the key that
 * was already written.
 */
import type { PointReason } from "@/db/schemas/ledger";
import type { CommentId, LikeId, MemeId, UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { EngagementError } from "../errors";

export const POINT_VALUES = {
  meme_created: 10,
  like_received: 5,
  comment_made: 2,
  daily_login: 1,
  like_removed_reversal: -5,
} as const satisfies Record<Exclude<PointReason, "bonus">, number>;

export const ledgerKeys = {
  meme: (memeId: MemeId) => `meme:${memeId}`,
  like: (likeId: LikeId) => `like:${likeId}`,
  unlike: (likeId: LikeId) => `unlike:${likeId}`,
  comment: (commentId: CommentId) => `comment:${commentId}`,
  login: (userId: UserId, day: string) => `login:${userId}:${day}`,
  bonus: (key: string) => `bonus:${key}`,
  milestone: (userId: UserId, memes: number) => `milestone:${userId}:${memes}`,
} as const;

export interface MemeMilestone {
  /** Memes created to reach it. */
  readonly memes: number;
  readonly points: number;
  readonly title: string;
}

/** Bonuses credited automatically as a creator's meme count grows. */
export const MEME_MILESTONES: ReadonlyArray<MemeMilestone> = Object.freeze([
  { memes: 5, points: 25, title: "First five memes" },
  { memes: 10, points: 50, title: "First ten memes" },
  { memes: 25, points: 75, title: "Quarter century" },
  { memes: 50, points: 100, title: "Half century" },
  { memes: 100, points: 200, title: "Century club" },
]);

export const milestonesReached = (memesCreated: number): MemeMilestone[] =>
  MEME_MILESTONES.filter((milestone) => memesCreated >= milestone.memes);

/** A point-affecting event as produced by the engine's write paths. */
export type LedgerEvent =
  | { reason: "meme_created"; userId: UserId; memeId: MemeId }
  | { reason: "like_received"; userId: UserId; likeId: LikeId }
  | { reason: "like_removed_reversal"; userId: UserId; likeId: LikeId }
  | { reason: "comment_made"; userId: UserId; commentId: CommentId }
  | { reason: "daily_login"; userId: UserId; day: string }
  | {
      reason: "bonus";
      userId: UserId;
      amount: number;
      note: string;
      key: string;
    }
  | { reason: "bonus"; userId: UserId; milestone: MemeMilestone };

export interface LedgerEntry {
  readonly userId: UserId;
  readonly reason: PointReason;
  readonly amount: number;
  readonly idempotencyKey: string;
  readonly note: string | null;
}

export interface BonusRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Resolve amount and key for an event. Only manual bonuses can fail
 * validation; milestone amounts come from the table, outside the manual range.
 */
export function resolveLedgerEntry(
  event: LedgerEvent,
  bonus: BonusRange,
): Result<LedgerEntry, EngagementError> {
  const entry = (amount: number, idempotencyKey: string, note: string | null = null) =>
    OkResult<LedgerEntry, EngagementError>({
      userId: event.userId,
      reason: event.reason,
      amount,
      idempotencyKey,
      note,
    });

  switch (event.reason) {
    case "meme_created":
      return entry(POINT_VALUES.meme_created, ledgerKeys.meme(event.memeId));
    case "like_received":
      return entry(POINT_VALUES.like_received, ledgerKeys.like(event.likeId));
    case "like_removed_reversal":
      return entry(
        POINT_VALUES.like_removed_reversal,
        ledgerKeys.unlike(event.likeId),
      );
    case "comment_made":
      return entry(POINT_VALUES.comment_made, ledgerKeys.comment(event.commentId));
    case "daily_login":
      return entry(POINT_VALUES.daily_login, ledgerKeys.login(event.userId, event.day));
    case "bonus": {
      if ("milestone" in event) {
        const { memes, points, title } = event.milestone;
        return entry(
          points,
          ledgerKeys.milestone(event.userId, memes),
          `Milestone: ${title} (${memes} memes)`,
        );
      }
      if (
        !Number.isInteger(event.amount) ||
        event.amount < bonus.min ||
        event.amount > bonus.max
      ) {
        return ErrResult(
          new EngagementError(
            "INVALID_AMOUNT",
            `Bonus must be an integer between ${bonus.min} and ${bonus.max}`,
          ),
        );
      }
      const note = event.note.trim();
      if (!note) {
        return ErrResult(
          new EngagementError("INVALID_INPUT", "Bonus requires a note"),
        );
      }
      if (!event.key.trim()) {
        return ErrResult(
          new EngagementError("INVALID_INPUT", "Bonus requires an idempotency key"),
        );
      }
      return entry(event.amount, ledgerKeys.bonus(event.key.trim()), note);
    }
  }
}
