import { deepClone } from "@/db/helpers";
import type { MemoryDatabase } from "@/db/memory";
import type { BadgeId, UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import { buildAwardId, type BadgeAwardRepository } from "./repository";
import type { BadgeAward } from "./types";

export class MemoryBadgeAwardRepository implements BadgeAwardRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async tryAward(
    userId: UserId,
    badgeId: BadgeId,
    awardedAt: Date,
  ): Promise<Result<BadgeAward | null, Error>> {
    const _id = buildAwardId(userId, badgeId);
    if (this.db.awards.has(_id)) return OkResult(null);

    const award: BadgeAward = { _id, userId, badgeId, awardedAt };
    this.db.awards.set(_id, deepClone(award));
    return OkResult(award);
  }

  async listForUser(userId: UserId): Promise<Result<BadgeAward[], Error>> {
    const awards = [...this.db.awards.values()]
      .filter((award) => award.userId === userId)
      .sort(
        (a, b) =>
          a.awardedAt.getTime() - b.awardedAt.getTime() ||
          (a._id < b._id ? -1 : a._id > b._id ? 1 : 0),
      );
    return OkResult(awards.map(deepClone));
  }
}
