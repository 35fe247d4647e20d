import type { CommentDoc, LikeDoc } from "@/db/schemas/interaction";
import type { TrendingCounts } from "@/db/schemas/trending";
import type { CommentId, MemeId } from "@/db/types";

export type Like = LikeDoc;
export type Comment = CommentDoc;

export type InsertLikeStatus =
  | { status: "inserted"; like: Like }
  | { status: "duplicate"; like: Like }
  | { status: "missing_meme" };

export type InsertCommentStatus =
  | { status: "inserted"; comment: Comment }
  | { status: "duplicate"; comment: Comment }
  | { status: "missing_meme" }
  | { status: "invalid_parent" };

export interface AddCommentOptions {
  readonly parentId?: CommentId | null;
  /** Caller-chosen id; replaying it makes the call idempotent. */
  readonly commentId?: CommentId;
}

export interface CommentThread {
  readonly comment: Comment;
  readonly replies: CommentThread[];
}

/** Half-open time range `[start, end)`; no `end` means "up to now". */
export interface TimeWindow {
  readonly start: Date;
  readonly end?: Date;
}

export type WindowCounts = Record<MemeId, TrendingCounts>;
