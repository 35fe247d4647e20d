/**
 * Interaction Guard.
 *
 * Purpose: validate and persist likes and comments, then credit points, log
 * activity, evaluate badges and update trending.
 *
 * Invariants:
 * - Like uniqueness is decided by the store, never by a read beforehand.
 * - Every follow-up write is keyed by the like/comment id, so a retry after
 *   a failure part-way completes the missing steps without double-crediting.
 *   A retried `addLike` whose like already landed heals its credit and still
 *   answers `ALREADY_LIKED`.
 * - `removeLike` settles the like's credit first, so a reversal never debits
 *   a credit that did not land. It records the reversal before deleting, so a
 *   failed delete is healed by retrying; the reversal key is the removed
 *   like's id.
 * - Trending is derived data: an incremental update that fails is logged and
 *   left to the next rebuild.
 */
import type { MemeId, UserId } from "@/db/types";
import type { EngagementHooks } from "@/events/hooks/engagement";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ActivityService } from "../activity/service";
import { activityKeys } from "../activity/types";
import type { BadgeService } from "../badges/service";
import { EngagementError, storeUnavailable } from "../errors";
import { isValidId, newId, requireId } from "../ids";
import type { LedgerService } from "../ledger/service";
import type { MemesRepository } from "../memes/repository";
import type { Meme } from "../memes/types";
import type { TrendingService } from "../leaderboard/trending";
import type { UsersRepository } from "../users/repository";
import type { InteractionsRepository } from "./repository";
import { buildCommentTree } from "./thread";
import type { AddCommentOptions, Comment, CommentThread, Like } from "./types";

export interface InteractionPolicy {
  readonly allowSelfLike: boolean;
  readonly maxCommentLength: number;
}

export interface InteractionServiceDeps {
  readonly users: UsersRepository;
  readonly memes: MemesRepository;
  readonly interactions: InteractionsRepository;
  readonly ledger: LedgerService;
  readonly activity: ActivityService;
  readonly badges: BadgeService;
  readonly trending: TrendingService;
  readonly hooks: EngagementHooks;
  readonly policy: InteractionPolicy;
  readonly clock: () => Date;
}

export class InteractionService {
  constructor(private readonly deps: InteractionServiceDeps) {}

  async addLike(userId: UserId, memeId: MemeId): Promise<Result<Like, EngagementError>> {
    const actorRes = await this.requireUser(userId);
    if (actorRes.isErr()) return ErrResult(actorRes.error);
    const memeRes = await this.requireMeme(memeId);
    if (memeRes.isErr()) return ErrResult(memeRes.error);
    const meme = memeRes.unwrap();

    if (!this.deps.policy.allowSelfLike && meme.ownerId === userId) {
      return ErrResult(new EngagementError("SELF_LIKE", "You cannot like your own meme"));
    }

    const like: Like = { _id: newId(), userId, memeId, createdAt: this.deps.clock() };
    const res = await this.deps.interactions.insertLike(like, meme.ownerId);
    if (res.isErr()) return ErrResult(storeUnavailable("Interactions.addLike", res.error));

    const status = res.unwrap();
    if (status.status === "missing_meme") {
      return ErrResult(new EngagementError("MEME_NOT_FOUND", `Unknown meme ${memeId}`));
    }

    const settled = await this.settleLike(status.like, meme);
    if (settled.isErr()) return ErrResult(settled.error);

    if (status.status === "duplicate") {
      return ErrResult(
        new EngagementError("ALREADY_LIKED", "You already liked this meme"),
      );
    }

    await this.updateTrending(this.deps.trending.onLikeAdded(status.like));
    void this.deps.hooks.likeAdded.emit(status.like, {
      ...meme,
      likeCount: meme.likeCount + 1,
    });
    return OkResult(status.like);
  }

  async removeLike(userId: UserId, memeId: MemeId): Promise<Result<void, EngagementError>> {
    const likeRes = await this.deps.interactions.findLike(userId, memeId);
    if (likeRes.isErr()) {
      return ErrResult(storeUnavailable("Interactions.removeLike", likeRes.error));
    }
    const like = likeRes.unwrap();
    if (!like) {
      return ErrResult(new EngagementError("NOT_LIKED", "You have not liked this meme"));
    }

    const memeRes = await this.requireMeme(memeId);
    if (memeRes.isErr()) return ErrResult(memeRes.error);
    const meme = memeRes.unwrap();

    const credited = await this.settleLike(like, meme);
    if (credited.isErr()) return ErrResult(credited.error);

    const reversal = await this.deps.ledger.record({
      reason: "like_removed_reversal",
      userId: meme.ownerId,
      likeId: like._id,
    });
    if (reversal.isErr()) return ErrResult(reversal.error);

    const deleted = await this.deps.interactions.deleteLike(like, meme.ownerId);
    if (deleted.isErr()) {
      return ErrResult(storeUnavailable("Interactions.removeLike", deleted.error));
    }
    if (!deleted.unwrap()) {
      // A concurrent removal got there first; its reversal is the one above.
      return ErrResult(new EngagementError("NOT_LIKED", "You have not liked this meme"));
    }

    const logged = await this.deps.activity.append({
      userId,
      kind: "like_removed",
      reference: like._id,
      metadata: { memeId, ownerId: meme.ownerId },
      key: activityKeys.likeRemoved(like._id),
    });
    if (logged.isErr()) return ErrResult(logged.error);

    await this.updateTrending(this.deps.trending.onLikeRemoved(like));
    void this.deps.hooks.likeRemoved.emit(like, {
      ...meme,
      likeCount: Math.max(0, meme.likeCount - 1),
    });
    return OkResult(undefined);
  }

  async addComment(
    userId: UserId,
    memeId: MemeId,
    body: string,
    options: AddCommentOptions = {},
  ): Promise<Result<Comment, EngagementError>> {
    const text = body.trim();
    if (!text) {
      return ErrResult(new EngagementError("EMPTY_BODY", "Comment cannot be empty"));
    }
    if (text.length > this.deps.policy.maxCommentLength) {
      return ErrResult(
        new EngagementError(
          "BODY_TOO_LONG",
          `Comment exceeds ${this.deps.policy.maxCommentLength} characters`,
        ),
      );
    }

    const idRes = requireId(options.commentId ?? newId(), "comment id");
    if (idRes.isErr()) return ErrResult(idRes.error);
    const commentId = idRes.unwrap();
    const parentId = options.parentId ?? null;
    if (parentId !== null && (parentId === commentId || !isValidId(parentId))) {
      return ErrResult(
        new EngagementError("INVALID_PARENT", "Parent comment does not exist on this meme"),
      );
    }

    const actorRes = await this.requireUser(userId);
    if (actorRes.isErr()) return ErrResult(actorRes.error);

    const comment: Comment = {
      _id: commentId,
      memeId,
      authorId: userId,
      parentId,
      body: text,
      createdAt: this.deps.clock(),
    };

    const res = await this.deps.interactions.insertComment(comment);
    if (res.isErr()) {
      return ErrResult(storeUnavailable("Interactions.addComment", res.error));
    }

    const status = res.unwrap();
    switch (status.status) {
      case "missing_meme":
        return ErrResult(new EngagementError("MEME_NOT_FOUND", `Unknown meme ${memeId}`));
      case "invalid_parent":
        return ErrResult(
          new EngagementError(
            "INVALID_PARENT",
            "Parent comment does not exist on this meme",
          ),
        );
      case "duplicate":
        if (status.comment.authorId !== userId || status.comment.memeId !== memeId) {
          return ErrResult(
            new EngagementError("INVALID_INPUT", `Comment id ${commentId} is already taken`),
          );
        }
        break;
      case "inserted":
        break;
    }

    const stored = status.comment;
    const points = await this.deps.ledger.record({
      reason: "comment_made",
      userId,
      commentId: stored._id,
    });
    if (points.isErr()) return ErrResult(points.error);

    const logged = await this.deps.activity.append({
      userId,
      kind: "comment_added",
      reference: stored._id,
      metadata: { memeId, parentId: stored.parentId },
      key: activityKeys.commentAdded(stored._id),
    });
    if (logged.isErr()) return ErrResult(logged.error);

    const evaluated = await this.deps.badges.evaluate(userId, ["commentsMade"]);
    if (evaluated.isErr()) return ErrResult(evaluated.error);

    if (status.status === "inserted") {
      await this.updateTrending(this.deps.trending.onCommentAdded(stored));
      void this.deps.hooks.commentAdded.emit(stored);
    }
    return OkResult(stored);
  }

  async getComment(commentId: string): Promise<Result<Comment | null, EngagementError>> {
    const res = await this.deps.interactions.getComment(commentId);
    if (res.isErr()) return ErrResult(storeUnavailable("Interactions.getComment", res.error));
    return OkResult(res.unwrap());
  }

  async listComments(memeId: MemeId): Promise<Result<CommentThread[], EngagementError>> {
    const memeRes = await this.requireMeme(memeId);
    if (memeRes.isErr()) return ErrResult(memeRes.error);

    const res = await this.deps.interactions.listComments(memeId);
    if (res.isErr()) return ErrResult(storeUnavailable("Interactions.listComments", res.error));
    return OkResult(buildCommentTree(res.unwrap()));
  }

  /** Credit, activity and badges for a like; each step is keyed by the like id. */
  private async settleLike(like: Like, meme: Meme): Promise<Result<void, EngagementError>> {
    const points = await this.deps.ledger.record({
      reason: "like_received",
      userId: meme.ownerId,
      likeId: like._id,
    });
    if (points.isErr()) return ErrResult(points.error);

    const logged = await this.deps.activity.append({
      userId: like.userId,
      kind: "like_added",
      reference: like._id,
      metadata: { memeId: like.memeId, ownerId: meme.ownerId },
      key: activityKeys.likeAdded(like._id),
    });
    if (logged.isErr()) return ErrResult(logged.error);

    const evaluated = await this.deps.badges.evaluate(meme.ownerId, ["likesReceived"]);
    if (evaluated.isErr()) return ErrResult(evaluated.error);
    return OkResult(undefined);
  }

  private async updateTrending(
    pending: Promise<Result<void, EngagementError>>,
  ): Promise<void> {
    const res = await pending;
    if (res.isErr()) {
      console.warn("[Trending] incremental update failed; next refresh will catch up", {
        error: res.error,
      });
    }
  }

  private async requireUser(userId: UserId): Promise<Result<void, EngagementError>> {
    const idRes = requireId(userId, "user id");
    if (idRes.isErr()) return ErrResult(idRes.error);
    const res = await this.deps.users.get(userId);
    if (res.isErr()) return ErrResult(storeUnavailable("Interactions", res.error));
    if (!res.unwrap()) {
      return ErrResult(new EngagementError("USER_NOT_FOUND", `Unknown user ${userId}`));
    }
    return OkResult(undefined);
  }

  private async requireMeme(memeId: MemeId): Promise<Result<Meme, EngagementError>> {
    const res = await this.deps.memes.get(memeId);
    if (res.isErr()) return ErrResult(storeUnavailable("Interactions", res.error));
    const meme = res.unwrap();
    if (!meme) {
      return ErrResult(new EngagementError("MEME_NOT_FOUND", `Unknown meme ${memeId}`));
    }
    return OkResult(meme);
  }
}
