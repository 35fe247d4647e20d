import { compareAndSwap } from "@/db/compare-and-swap";
import { deepClone } from "@/db/helpers";
import type { MemoryDatabase } from "@/db/memory";
import type { LoginStreak } from "@/db/schemas/user";
import type { UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { UsersRepository } from "./repository";
import { computeNextStreak, sameStreak, STREAK_SWAP_ATTEMPTS } from "./streak";
import {
  createUserDoc,
  type EngagementUser,
  type NewUserInput,
  type RegisterOutcome,
  type StreakUpdate,
} from "./types";

/** Same ordering as `LEADERBOARD_SORT`. Negative when `a` ranks first. */
export function compareLeaderboard(a: EngagementUser, b: EngagementUser): number {
  if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;
  const byAge = a.createdAt.getTime() - b.createdAt.getTime();
  if (byAge !== 0) return byAge;
  return a._id < b._id ? -1 : a._id > b._id ? 1 : 0;
}

export class MemoryUsersRepository implements UsersRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async create(input: NewUserInput): Promise<Result<RegisterOutcome, Error>> {
    const existing = this.db.users.get(input.userId);
    if (existing) return OkResult({ user: deepClone(existing), created: false });

    const doc = createUserDoc(input);
    this.db.users.set(doc._id, deepClone(doc));
    return OkResult({ user: doc, created: true });
  }

  async get(userId: UserId): Promise<Result<EngagementUser | null, Error>> {
    return OkResult(deepClone(this.db.users.get(userId) ?? null));
  }

  async getMany(userIds: readonly UserId[]): Promise<Result<EngagementUser[], Error>> {
    const found: EngagementUser[] = [];
    for (const id of new Set(userIds)) {
      const user = this.db.users.get(id);
      if (user) found.push(deepClone(user));
    }
    return OkResult(found);
  }

  async top(limit: number, offset: number): Promise<Result<EngagementUser[], Error>> {
    const ordered = [...this.db.users.values()].sort(compareLeaderboard);
    return OkResult(ordered.slice(offset, offset + limit).map(deepClone));
  }

  async countAhead(user: EngagementUser): Promise<Result<number, Error>> {
    let ahead = 0;
    for (const other of this.db.users.values()) {
      if (compareLeaderboard(other, user) < 0) ahead += 1;
    }
    return OkResult(ahead);
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
        const user = this.db.users.get(userId);
        return OkResult(user ? { ...user.streak } : null);
      },
      next: (streak) => computeNextStreak(streak, dayStamp),
      equals: sameStreak,
      write: async (expected, next) => {
        const user = this.db.users.get(userId);
        if (!user || !sameStreak(user.streak, expected)) return OkResult(false);
        user.streak = { ...next };
        user.updatedAt = at;
        return OkResult(true);
      },
    });
  }
}
