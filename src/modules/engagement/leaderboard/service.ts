/**
 * Leaderboard Service.
 *
 * Order: total points desc, earlier account first on ties, then user id.
 * Reads users only; never writes.
 */
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { EngagementError, storeUnavailable } from "../errors";
import type { UsersRepository } from "../users/repository";
import type { LeaderboardEntry } from "./types";

export interface LeaderboardServiceDeps {
  readonly users: UsersRepository;
  readonly maxLimit: number;
}

export class LeaderboardService {
  constructor(private readonly deps: LeaderboardServiceDeps) {}

  async topByPoints(
    limit: number,
    offset = 0,
  ): Promise<Result<LeaderboardEntry[], EngagementError>> {
    if (!Number.isInteger(limit) || limit < 1 || !Number.isInteger(offset) || offset < 0) {
      return ErrResult(
        new EngagementError("INVALID_INPUT", "limit must be >= 1 and offset >= 0"),
      );
    }
    const capped = Math.min(limit, this.deps.maxLimit);

    const res = await this.deps.users.top(capped, offset);
    if (res.isErr()) return ErrResult(storeUnavailable("Leaderboard", res.error));

    return OkResult(
      res.unwrap().map((user, index) => ({
        position: offset + index + 1,
        userId: user._id,
        displayName: user.displayName,
        totalPoints: user.totalPoints,
        rank: user.rank,
      })),
    );
  }

  /** 1-based position, or `null` for an unknown user. */
  async positionOf(userId: UserId): Promise<Result<number | null, EngagementError>> {
    const userRes = await this.deps.users.get(userId);
    if (userRes.isErr()) return ErrResult(storeUnavailable("Leaderboard", userRes.error));
    const user = userRes.unwrap();
    if (!user) return OkResult(null);

    const ahead = await this.deps.users.countAhead(user);
    if (ahead.isErr()) return ErrResult(storeUnavailable("Leaderboard", ahead.error));
    return OkResult(ahead.unwrap() + 1);
  }
}
