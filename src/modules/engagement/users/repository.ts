/**
 * Users Repository.
 *
 * Purpose: persistence for engagement users: registration, leaderboard reads
 * and the login streak. Point totals and counters are written by the ledger,
 * meme and interaction repositories inside their own atomic units.
 */
import { compareAndSwap } from "@/db/compare-and-swap";
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { MongoStore } from "@/db/mongo-store";
import { UserSchema, type LoginStreak, type UserDoc } from "@/db/schemas/user";
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { computeNextStreak, sameStreak, STREAK_SWAP_ATTEMPTS } from "./streak";
import {
  createUserDoc,
  type EngagementUser,
  type NewUserInput,
  type RegisterOutcome,
  type StreakUpdate,
} from "./types";

export const USERS_COLLECTION = "users";
export const UsersStore = new MongoStore<UserDoc>(USERS_COLLECTION, UserSchema);

/** Leaderboard order: points desc, older account first, id as final tiebreak. */
export const LEADERBOARD_SORT = { totalPoints: -1, createdAt: 1, _id: 1 } as const;

export interface UsersRepository {
  /** Insert the user unless it exists; never overwrites. */
  create(input: NewUserInput): Promise<Result<RegisterOutcome, Error>>;
  get(userId: UserId): Promise<Result<EngagementUser | null, Error>>;
  getMany(userIds: readonly UserId[]): Promise<Result<EngagementUser[], Error>>;
  /** Users in leaderboard order. */
  top(limit: number, offset: number): Promise<Result<EngagementUser[], Error>>;
  /** How many users rank strictly ahead of `user`. */
  countAhead(user: EngagementUser): Promise<Result<number, Error>>;
  /** Apply a login on `dayStamp`; `Ok(null)` when the user is unknown. */
  recordLoginDay(
    userId: UserId,
    dayStamp: number,
    at: Date,
  ): Promise<Result<StreakUpdate | null, Error>>;
}

class UsersRepositoryImpl implements UsersRepository {
  async create(input: NewUserInput): Promise<Result<RegisterOutcome, Error>> {
    const doc = createUserDoc(input);
    try {
      const col = await UsersStore.collection();
      await col.insertOne(doc);
      return OkResult({ user: doc, created: true });
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        console.error("[UsersRepository] create error:", error);
        return ErrResult(toError(error));
      }
    }

    const existing = await UsersStore.get(input.userId);
    if (existing.isErr()) return ErrResult(existing.error);
    const user = existing.unwrap();
    if (!user) {
      return ErrResult(new Error(`User ${input.userId} collided but is unreadable`));
    }
    return OkResult({ user, created: false });
  }

  get(userId: UserId): Promise<Result<EngagementUser | null, Error>> {
    return UsersStore.get(userId);
  }

  getMany(userIds: readonly UserId[]): Promise<Result<EngagementUser[], Error>> {
    if (userIds.length === 0) return Promise.resolve(OkResult([]));
    return UsersStore.find({ _id: { $in: [...userIds] } });
  }

  top(limit: number, offset: number): Promise<Result<EngagementUser[], Error>> {
    return UsersStore.find({}, { sort: LEADERBOARD_SORT, skip: offset, limit });
  }

  async countAhead(user: EngagementUser): Promise<Result<number, Error>> {
    try {
      const col = await UsersStore.collection();
      const count = await col.countDocuments({
        $or: [
          { totalPoints: { $gt: user.totalPoints } },
          { totalPoints: user.totalPoints, createdAt: { $lt: user.createdAt } },
          {
            totalPoints: user.totalPoints,
            createdAt: user.createdAt,
            _id: { $lt: user._id },
          },
        ],
      });
      return OkResult(count);
    } catch (error) {
      console.error("[UsersRepository] countAhead error:", error);
      return ErrResult(toError(error));
    }
  }

  async recordLoginDay(
    userId: UserId,
    dayStamp: number,
    at: Date,
  ): Promise<Result<StreakUpdate | null, Error>> {
    return compareAndSwap<LoginStreak>({
      label: `Streak update for ${userId}`,
      attempts: STREAK_SWAP_ATTEMPTS,
      read: async () => {
        const found = await UsersStore.get(userId);
        if (found.isErr()) return ErrResult(found.error);
        return OkResult(found.unwrap()?.streak ?? null);
      },
      next: (streak) => computeNextStreak(streak, dayStamp),
      equals: sameStreak,
      write: async (expected, next) => {
        try {
          const col = await UsersStore.collection();
          const res = await col.updateOne(
            {
              _id: userId,
              "streak.lastLoginDay": expected.lastLoginDay,
              "streak.current": expected.current,
              "streak.best": expected.best,
            },
            { $set: { streak: next, updatedAt: at } },
          );
          return OkResult(res.modifiedCount === 1);
        } catch (error) {
          console.error("[UsersRepository] recordLoginDay error:", error);
          return ErrResult(toError(error));
        }
      },
    });
  }
}

export const usersRepository: UsersRepository = new UsersRepositoryImpl();
