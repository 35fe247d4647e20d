import { deepClone } from "@/db/helpers";
import type { MemoryDatabase } from "@/db/memory";
import type { MemeId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { MemesRepository } from "./repository";
import type { CreateMemeStatus, Meme } from "./types";

export class MemoryMemesRepository implements MemesRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async create(meme: Meme): Promise<Result<CreateMemeStatus, Error>> {
    const existing = this.db.memes.get(meme._id);
    if (existing) return OkResult({ status: "duplicate", meme: deepClone(existing) });

    const owner = this.db.users.get(meme.ownerId);
    if (!owner) return OkResult({ status: "missing_owner" });

    this.db.memes.set(meme._id, deepClone(meme));
    owner.stats.memesCreated += 1;
    owner.updatedAt = meme.createdAt;
    return OkResult({ status: "created", meme: deepClone(meme) });
  }

  async get(memeId: MemeId): Promise<Result<Meme | null, Error>> {
    return OkResult(deepClone(this.db.memes.get(memeId) ?? null));
  }

  async getMany(memeIds: readonly MemeId[]): Promise<Result<Meme[], Error>> {
    const found: Meme[] = [];
    for (const id of new Set(memeIds)) {
      const meme = this.db.memes.get(id);
      if (meme) found.push(deepClone(meme));
    }
    return OkResult(found);
  }
}
