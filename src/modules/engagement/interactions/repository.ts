/**
 * Interactions Repository (likes and comments).
 *
 * Invariants:
 * - `likes` has a unique index on (userId, memeId). The index, not a prior
 *   read, decides which of two concurrent likes wins.
 * - Each like/comment write commits together with the counters it moves:
 *   `memes.likeCount`, `memes.commentCount`, the owner's
 *   `stats.likesReceived` and the author's `stats.commentsMade`.
 * - A comment's parent is read inside the same transaction and must belong
 *   to the same meme; parents always pre-exist their replies, so the tree
 *   cannot cycle.
 */
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { getDb } from "@/db/mongo";
import { MongoStore } from "@/db/mongo-store";
import {
  CommentSchema,
  LikeSchema,
  type CommentDoc,
  type LikeDoc,
} from "@/db/schemas/interaction";
import type { TrendingCounts } from "@/db/schemas/trending";
import { runInTransaction } from "@/db/transaction";
import type { CommentId, MemeId, UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { MemesStore } from "../memes/repository";
import { UsersStore } from "../users/repository";
import type {
  Comment,
  InsertCommentStatus,
  InsertLikeStatus,
  Like,
  TimeWindow,
  WindowCounts,
} from "./types";

export const LIKES_COLLECTION = "likes";
export const COMMENTS_COLLECTION = "comments";
export const LikesStore = new MongoStore<LikeDoc>(LIKES_COLLECTION, LikeSchema);
export const CommentsStore = new MongoStore<CommentDoc>(COMMENTS_COLLECTION, CommentSchema);

export interface InteractionsRepository {
  /** Insert a like and bump the meme and owner counters. */
  insertLike(like: Like, ownerId: UserId): Promise<Result<InsertLikeStatus, Error>>;
  findLike(userId: UserId, memeId: MemeId): Promise<Result<Like | null, Error>>;
  /** Delete a like by id and roll its counters back. `false` if already gone. */
  deleteLike(like: Like, ownerId: UserId): Promise<Result<boolean, Error>>;
  insertComment(comment: Comment): Promise<Result<InsertCommentStatus, Error>>;
  getComment(commentId: CommentId): Promise<Result<Comment | null, Error>>;
  listComments(memeId: MemeId): Promise<Result<Comment[], Error>>;
  /** Current likes and all comments created within `window`, per meme. */
  countInWindow(window: TimeWindow): Promise<Result<WindowCounts, Error>>;
}

const windowFilter = (window: TimeWindow) =>
  window.end
    ? { createdAt: { $gte: window.start, $lt: window.end } }
    : { createdAt: { $gte: window.start } };

async function groupByMeme(
  collectionName: string,
  window: TimeWindow,
): Promise<Map<string, number>> {
  const col = (await getDb()).collection(collectionName);
  const rows = await col
    .aggregate<{ _id: string; count: number }>([
      { $match: windowFilter(window) },
      { $group: { _id: "$memeId", count: { $sum: 1 } } },
    ])
    .toArray();
  return new Map(rows.map((row) => [row._id, row.count]));
}

class InteractionsRepositoryImpl implements InteractionsRepository {
  async insertLike(like: Like, ownerId: UserId): Promise<Result<InsertLikeStatus, Error>> {
    try {
      const status = await runInTransaction<InsertLikeStatus>(async (session) => {
        const memes = await MemesStore.collection();
        const likes = await LikesStore.collection();
        const users = await UsersStore.collection();

        const meme = await memes.updateOne(
          { _id: like.memeId },
          { $inc: { likeCount: 1 } },
          { session },
        );
        if (meme.matchedCount === 0) return { status: "missing_meme" };

        // E11000 on (userId, memeId) aborts the whole unit, counters included.
        await likes.insertOne(like, { session });
        await users.updateOne(
          { _id: ownerId },
          { $inc: { "stats.likesReceived": 1 }, $set: { updatedAt: like.createdAt } },
          { session },
        );
        return { status: "inserted", like };
      });
      return OkResult(status);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const existing = await this.findLike(like.userId, like.memeId);
        if (existing.isErr()) return ErrResult(existing.error);
        const held = existing.unwrap();
        if (held) return OkResult({ status: "duplicate", like: held });
      }
      console.error("[InteractionsRepository] insertLike error:", error);
      return ErrResult(toError(error));
    }
  }

  findLike(userId: UserId, memeId: MemeId): Promise<Result<Like | null, Error>> {
    return LikesStore.findOne({ userId, memeId });
  }

  async deleteLike(like: Like, ownerId: UserId): Promise<Result<boolean, Error>> {
    try {
      const deleted = await runInTransaction<boolean>(async (session) => {
        const likes = await LikesStore.collection();
        const memes = await MemesStore.collection();
        const users = await UsersStore.collection();

        const res = await likes.deleteOne({ _id: like._id }, { session });
        if (res.deletedCount === 0) return false;

        await memes.updateOne(
          { _id: like.memeId },
          { $inc: { likeCount: -1 } },
          { session },
        );
        await users.updateOne(
          { _id: ownerId },
          { $inc: { "stats.likesReceived": -1 } },
          { session },
        );
        return true;
      });
      return OkResult(deleted);
    } catch (error) {
      console.error("[InteractionsRepository] deleteLike error:", error);
      return ErrResult(toError(error));
    }
  }

  async insertComment(comment: Comment): Promise<Result<InsertCommentStatus, Error>> {
    try {
      const status = await runInTransaction<InsertCommentStatus>(async (session) => {
        const memes = await MemesStore.collection();
        const comments = await CommentsStore.collection();
        const users = await UsersStore.collection();

        const meme = await memes.findOne({ _id: comment.memeId }, { session });
        if (!meme) return { status: "missing_meme" };

        const existing = await comments.findOne({ _id: comment._id }, { session });
        const replayed = existing ? CommentsStore.parse(existing) : null;
        if (replayed) return { status: "duplicate", comment: replayed };

        if (comment.parentId) {
          const parent = await comments.findOne({ _id: comment.parentId }, { session });
          if (!parent || parent.memeId !== comment.memeId) {
            return { status: "invalid_parent" };
          }
        }

        await comments.insertOne(comment, { session });
        await memes.updateOne(
          { _id: comment.memeId },
          { $inc: { commentCount: 1 } },
          { session },
        );
        await users.updateOne(
          { _id: comment.authorId },
          {
            $inc: { "stats.commentsMade": 1 },
            $set: { updatedAt: comment.createdAt },
          },
          { session },
        );
        return { status: "inserted", comment };
      });
      return OkResult(status);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const existing = await this.getComment(comment._id);
        if (existing.isErr()) return ErrResult(existing.error);
        const stored = existing.unwrap();
        if (stored) return OkResult({ status: "duplicate", comment: stored });
      }
      console.error("[InteractionsRepository] insertComment error:", error);
      return ErrResult(toError(error));
    }
  }

  getComment(commentId: CommentId): Promise<Result<Comment | null, Error>> {
    return CommentsStore.get(commentId);
  }

  listComments(memeId: MemeId): Promise<Result<Comment[], Error>> {
    return CommentsStore.find({ memeId }, { sort: { createdAt: 1, _id: 1 } });
  }

  async countInWindow(window: TimeWindow): Promise<Result<WindowCounts, Error>> {
    try {
      const [likes, comments] = await Promise.all([
        groupByMeme(LIKES_COLLECTION, window),
        groupByMeme(COMMENTS_COLLECTION, window),
      ]);
      const counts = new Map<MemeId, TrendingCounts>();
      for (const [memeId, count] of likes) {
        counts.set(memeId, { likes: count, comments: 0 });
      }
      for (const [memeId, count] of comments) {
        const entry = counts.get(memeId) ?? { likes: 0, comments: 0 };
        counts.set(memeId, { ...entry, comments: count });
      }
      const result: WindowCounts = Object.fromEntries(counts);
      return OkResult(result);
    } catch (error) {
      console.error("[InteractionsRepository] countInWindow error:", error);
      return ErrResult(toError(error));
    }
  }
}

export const interactionsRepository: InteractionsRepository =
  new InteractionsRepositoryImpl();
