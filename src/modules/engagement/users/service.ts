/**
 * Users Service.
 *
 * Purpose: registration and the profile view (points, rank progress,
 * statistics, streak, held badges). Identity comes from the caller; this
 * service trusts the id it is given.
 */
import { getUtcDayStamp } from "@/db/helpers";
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { BadgeCatalog } from "../badges/catalog";
import type { BadgeAwardRepository } from "../badges/repository";
import { EngagementError, storeUnavailable } from "../errors";
import { requireId } from "../ids";
import { getLevel, getNextRank } from "../ledger/ranks";
import type { UsersRepository } from "./repository";
import { visibleStreak } from "./streak";
import type { EngagementUser, HeldBadge, RegisterOutcome, UserProfile } from "./types";

const MAX_DISPLAY_NAME_LENGTH = 50;

export interface UsersServiceDeps {
  readonly users: UsersRepository;
  readonly awards: BadgeAwardRepository;
  readonly catalog: BadgeCatalog;
  readonly clock: () => Date;
}

export class UsersService {
  constructor(private readonly deps: UsersServiceDeps) {}

  /** Create the user if missing; an existing record is returned untouched. */
  async registerUser(
    userId: UserId,
    displayName: string,
  ): Promise<Result<RegisterOutcome, EngagementError>> {
    const idRes = requireId(userId, "user id");
    if (idRes.isErr()) return ErrResult(idRes.error);

    const name = displayName.trim();
    if (!name || name.length > MAX_DISPLAY_NAME_LENGTH) {
      return ErrResult(
        new EngagementError(
          "INVALID_INPUT",
          `Display name must be 1-${MAX_DISPLAY_NAME_LENGTH} characters`,
        ),
      );
    }

    const res = await this.deps.users.create({
      userId,
      displayName: name,
      createdAt: this.deps.clock(),
    });
    if (res.isErr()) return ErrResult(storeUnavailable("Users.register", res.error));
    return OkResult(res.unwrap());
  }

  async getUser(userId: UserId): Promise<Result<EngagementUser, EngagementError>> {
    const res = await this.deps.users.get(userId);
    if (res.isErr()) return ErrResult(storeUnavailable("Users.get", res.error));
    const user = res.unwrap();
    if (!user) {
      return ErrResult(new EngagementError("USER_NOT_FOUND", `Unknown user ${userId}`));
    }
    return OkResult(user);
  }

  async getProfile(userId: UserId): Promise<Result<UserProfile, EngagementError>> {
    const userRes = await this.getUser(userId);
    if (userRes.isErr()) return ErrResult(userRes.error);
    const user = userRes.unwrap();

    const awardsRes = await this.deps.awards.listForUser(userId);
    if (awardsRes.isErr()) return ErrResult(storeUnavailable("Users.profile", awardsRes.error));

    const badges: HeldBadge[] = [];
    for (const award of awardsRes.unwrap()) {
      const badge = this.deps.catalog.get(award.badgeId);
      // Awards for badges retired from the catalog stay stored but are not shown.
      if (!badge) continue;
      badges.push({
        badgeId: badge.id,
        name: badge.name,
        emoji: badge.emoji,
        awardedAt: award.awardedAt,
      });
    }

    return OkResult({
      userId: user._id,
      displayName: user.displayName,
      totalPoints: user.totalPoints,
      rank: user.rank,
      nextRank: getNextRank(user.totalPoints),
      level: getLevel(user.totalPoints),
      stats: user.stats,
      streak: visibleStreak(user.streak, getUtcDayStamp(this.deps.clock())),
      badges,
      createdAt: user.createdAt,
    });
  }
}
