/**
 * Memes Repository.
 *
 * Invariants: a meme insert and the owner's `stats.memesCreated` increment
 * commit together. `likeCount` / `commentCount` are only written by the
 * interactions repository, inside the same transaction as the like or comment.
 */
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { MongoStore } from "@/db/mongo-store";
import { MemeSchema, type MemeDoc } from "@/db/schemas/meme";
import { runInTransaction } from "@/db/transaction";
import type { MemeId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { UsersStore } from "../users/repository";
import type { CreateMemeStatus, Meme } from "./types";

export const MEMES_COLLECTION = "memes";
export const MemesStore = new MongoStore<MemeDoc>(MEMES_COLLECTION, MemeSchema);

export interface MemesRepository {
  create(meme: Meme): Promise<Result<CreateMemeStatus, Error>>;
  get(memeId: MemeId): Promise<Result<Meme | null, Error>>;
  getMany(memeIds: readonly MemeId[]): Promise<Result<Meme[], Error>>;
}

class MemesRepositoryImpl implements MemesRepository {
  async create(meme: Meme): Promise<Result<CreateMemeStatus, Error>> {
    try {
      const status = await runInTransaction<CreateMemeStatus>(async (session) => {
        const memeCol = await MemesStore.collection();
        const userCol = await UsersStore.collection();

        const owner = await userCol.updateOne(
          { _id: meme.ownerId },
          { $inc: { "stats.memesCreated": 1 }, $set: { updatedAt: meme.createdAt } },
          { session },
        );
        if (owner.matchedCount === 0) return { status: "missing_owner" };

        await memeCol.insertOne(meme, { session });
        return { status: "created", meme };
      });
      return OkResult(status);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const existing = await MemesStore.get(meme._id);
        if (existing.isErr()) return ErrResult(existing.error);
        const stored = existing.unwrap();
        if (stored) return OkResult({ status: "duplicate", meme: stored });
      }
      console.error("[MemesRepository] create error:", error);
      return ErrResult(toError(error));
    }
  }

  get(memeId: MemeId): Promise<Result<Meme | null, Error>> {
    return MemesStore.get(memeId);
  }

  getMany(memeIds: readonly MemeId[]): Promise<Result<Meme[], Error>> {
    if (memeIds.length === 0) return Promise.resolve(OkResult([]));
    return MemesStore.find({ _id: { $in: [...memeIds] } });
  }
}

export const memesRepository: MemesRepository = new MemesRepositoryImpl();
