import { deepClone } from "@/db/helpers";
import { likePairKey, type MemoryDatabase } from "@/db/memory";
import type { TrendingCounts } from "@/db/schemas/trending";
import type { CommentId, MemeId, UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { InteractionsRepository } from "./repository";
import type {
  Comment,
  InsertCommentStatus,
  InsertLikeStatus,
  Like,
  TimeWindow,
  WindowCounts,
} from "./types";

const inWindow = (at: Date, window: TimeWindow): boolean =>
  at.getTime() >= window.start.getTime() &&
  (window.end === undefined || at.getTime() < window.end.getTime());

export class MemoryInteractionsRepository implements InteractionsRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async insertLike(like: Like, ownerId: UserId): Promise<Result<InsertLikeStatus, Error>> {
    const meme = this.db.memes.get(like.memeId);
    if (!meme) return OkResult({ status: "missing_meme" });

    const pair = likePairKey(like.userId, like.memeId);
    const heldId = this.db.likeByPair.get(pair);
    const held = heldId ? this.db.likes.get(heldId) : undefined;
    if (held) return OkResult({ status: "duplicate", like: deepClone(held) });

    this.db.likes.set(like._id, deepClone(like));
    this.db.likeByPair.set(pair, like._id);
    meme.likeCount += 1;
    const owner = this.db.users.get(ownerId);
    if (owner) {
      owner.stats.likesReceived += 1;
      owner.updatedAt = like.createdAt;
    }
    return OkResult({ status: "inserted", like: deepClone(like) });
  }

  async findLike(userId: UserId, memeId: MemeId): Promise<Result<Like | null, Error>> {
    const id = this.db.likeByPair.get(likePairKey(userId, memeId));
    const like = id ? this.db.likes.get(id) : undefined;
    return OkResult(like ? deepClone(like) : null);
  }

  async deleteLike(like: Like, ownerId: UserId): Promise<Result<boolean, Error>> {
    if (!this.db.likes.delete(like._id)) return OkResult(false);

    this.db.likeByPair.delete(likePairKey(like.userId, like.memeId));
    const meme = this.db.memes.get(like.memeId);
    if (meme) meme.likeCount -= 1;
    const owner = this.db.users.get(ownerId);
    if (owner) owner.stats.likesReceived -= 1;
    return OkResult(true);
  }

  async insertComment(comment: Comment): Promise<Result<InsertCommentStatus, Error>> {
    const meme = this.db.memes.get(comment.memeId);
    if (!meme) return OkResult({ status: "missing_meme" });

    const existing = this.db.comments.get(comment._id);
    if (existing) return OkResult({ status: "duplicate", comment: deepClone(existing) });

    if (comment.parentId) {
      const parent = this.db.comments.get(comment.parentId);
      if (!parent || parent.memeId !== comment.memeId) {
        return OkResult({ status: "invalid_parent" });
      }
    }

    this.db.comments.set(comment._id, deepClone(comment));
    meme.commentCount += 1;
    const author = this.db.users.get(comment.authorId);
    if (author) {
      author.stats.commentsMade += 1;
      author.updatedAt = comment.createdAt;
    }
    return OkResult({ status: "inserted", comment: deepClone(comment) });
  }

  async getComment(commentId: CommentId): Promise<Result<Comment | null, Error>> {
    return OkResult(deepClone(this.db.comments.get(commentId) ?? null));
  }

  async listComments(memeId: MemeId): Promise<Result<Comment[], Error>> {
    const rows = [...this.db.comments.values()]
      .filter((comment) => comment.memeId === memeId)
      .sort(
        (a, b) =>
          a.createdAt.getTime() - b.createdAt.getTime() ||
          (a._id < b._id ? -1 : a._id > b._id ? 1 : 0),
      );
    return OkResult(rows.map(deepClone));
  }

  async countInWindow(window: TimeWindow): Promise<Result<WindowCounts, Error>> {
    const counts = new Map<MemeId, TrendingCounts>();
    const bucket = (memeId: MemeId) => {
      const entry = counts.get(memeId) ?? { likes: 0, comments: 0 };
      counts.set(memeId, entry);
      return entry;
    };
    for (const like of this.db.likes.values()) {
      if (inWindow(like.createdAt, window)) bucket(like.memeId).likes += 1;
    }
    for (const comment of this.db.comments.values()) {
      if (inWindow(comment.createdAt, window)) bucket(comment.memeId).comments += 1;
    }
    return OkResult(Object.fromEntries(counts));
  }
}
