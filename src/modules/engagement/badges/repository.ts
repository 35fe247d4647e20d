/**
 * Badge Award Repository.
 *
 * Invariants: award `_id` is `userId:badgeId`, so the primary key allows one
 * award per pair ever. `tryAward` reports whether this call created it;
 * losing a race is `Ok(null)`, not an error. Awards are never removed.
 */
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { MongoStore } from "@/db/mongo-store";
import { BadgeAwardSchema, type BadgeAwardDoc } from "@/db/schemas/badge";
import type { BadgeId, UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { BadgeAward } from "./types";

export const AWARDS_COLLECTION = "badge_awards";
export const AwardsStore = new MongoStore<BadgeAwardDoc>(
  AWARDS_COLLECTION,
  BadgeAwardSchema,
);

export const buildAwardId = (userId: UserId, badgeId: BadgeId): string =>
  `${userId}:${badgeId}`;

export interface BadgeAwardRepository {
  /** Insert the award if absent. `Ok(null)` when the user already holds it. */
  tryAward(
    userId: UserId,
    badgeId: BadgeId,
    awardedAt: Date,
  ): Promise<Result<BadgeAward | null, Error>>;
  listForUser(userId: UserId): Promise<Result<BadgeAward[], Error>>;
}

class BadgeAwardRepositoryImpl implements BadgeAwardRepository {
  async tryAward(
    userId: UserId,
    badgeId: BadgeId,
    awardedAt: Date,
  ): Promise<Result<BadgeAward | null, Error>> {
    const _id = buildAwardId(userId, badgeId);
    try {
      const col = await AwardsStore.collection();
      // $setOnInsert never overwrites an existing award.
      const res = await col.updateOne(
        { _id },
        { $setOnInsert: { userId, badgeId, awardedAt } },
        { upsert: true },
      );
      if (res.upsertedCount !== 1) return OkResult(null);
      return OkResult({ _id, userId, badgeId, awardedAt });
    } catch (error) {
      // Two concurrent upserts on the same _id: one of them gets E11000.
      if (isDuplicateKeyError(error)) return OkResult(null);
      console.error("[BadgeAwardRepository] tryAward error:", error);
      return ErrResult(toError(error));
    }
  }

  listForUser(userId: UserId): Promise<Result<BadgeAward[], Error>> {
    return AwardsStore.find({ userId }, { sort: { awardedAt: 1, _id: 1 } });
  }
}

export const badgeAwardRepository: BadgeAwardRepository =
  new BadgeAwardRepositoryImpl();
