/**
 * Badge Service.
 *
 * Purpose: decide which badges a user newly qualifies for and award each one
 * exactly once.
 * Invariants:
 * - Criteria see the user's current statistics only.
 * - Awards go through `tryAward`, so concurrent evaluations for the same user
 *   produce one award per badge; the loser gets nothing and no error.
 * - Badges carry no points.
 * Gotchas: the activity entry for an award is keyed by the award id and
 * written before the award, so a retry after a failure in between converges.
 */
import type { UserId } from "@/db/types";
import type { EngagementHooks } from "@/events/hooks/engagement";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ActivityService } from "../activity/service";
import { activityKeys } from "../activity/types";
import { EngagementError, storeUnavailable } from "../errors";
import type { UsersRepository } from "../users/repository";
import type { EngagementUser } from "../users/types";
import type { BadgeCatalog } from "./catalog";
import { criteriaProgress, isSatisfied, statsFromUser } from "./criteria";
import { buildAwardId, type BadgeAwardRepository } from "./repository";
import type {
  AwardedBadge,
  BadgeAward,
  BadgeBoard,
  BadgeCategory,
  BadgeStat,
} from "./types";

function emptyCategoryCounts(): Record<BadgeCategory, { held: number; total: number }> {
  return {
    creator: { held: 0, total: 0 },
    social: { held: 0, total: 0 },
    achievement: { held: 0, total: 0 },
    time_based: { held: 0, total: 0 },
    quality: { held: 0, total: 0 },
  };
}

export interface BadgeServiceDeps {
  readonly users: UsersRepository;
  readonly awards: BadgeAwardRepository;
  readonly activity: ActivityService;
  readonly hooks: EngagementHooks;
  readonly catalog: BadgeCatalog;
  readonly clock: () => Date;
}

export class BadgeService {
  constructor(private readonly deps: BadgeServiceDeps) {}

  get catalog(): BadgeCatalog {
    return this.deps.catalog;
  }

  /**
   * Award every badge the user now satisfies and does not hold yet.
   * `triggers` narrows evaluation to badges depending on those statistics;
   * an empty list evaluates the whole catalog.
   */
  async evaluate(
    userId: UserId,
    triggers: readonly BadgeStat[] = [],
  ): Promise<Result<AwardedBadge[], EngagementError>> {
    const affected = this.deps.catalog.affectedBy(triggers);
    if (affected.length === 0) return OkResult([]);

    const userRes = await this.loadUser(userId);
    if (userRes.isErr()) return ErrResult(userRes.error);
    const stats = statsFromUser(userRes.unwrap());

    const heldRes = await this.deps.awards.listForUser(userId);
    if (heldRes.isErr()) return ErrResult(storeUnavailable("Badges.evaluate", heldRes.error));
    const held = new Set(heldRes.unwrap().map((award) => award.badgeId));

    const candidates = affected.filter(
      (badge) => !held.has(badge.id) && isSatisfied(badge.criteria, stats),
    );

    const awarded: AwardedBadge[] = [];
    for (const badge of candidates) {
      const logged = await this.deps.activity.append({
        userId,
        kind: "badge_awarded",
        reference: badge.id,
        metadata: { name: badge.name, emoji: badge.emoji, category: badge.category },
        key: activityKeys.badgeAwarded(buildAwardId(userId, badge.id)),
      });
      if (logged.isErr()) return ErrResult(logged.error);

      const res = await this.deps.awards.tryAward(userId, badge.id, this.deps.clock());
      if (res.isErr()) return ErrResult(storeUnavailable("Badges.evaluate", res.error));
      const award = res.unwrap();
      if (award) awarded.push({ badge, award });
    }

    for (const { award, badge } of awarded) {
      void this.deps.hooks.badgeAwarded.emit(award, badge);
    }
    return OkResult(awarded);
  }

  async getAwards(userId: UserId): Promise<Result<BadgeAward[], EngagementError>> {
    const res = await this.deps.awards.listForUser(userId);
    if (res.isErr()) return ErrResult(storeUnavailable("Badges.getAwards", res.error));
    return OkResult(res.unwrap());
  }

  /** Every catalog badge with held state and progress, plus per-category counts. */
  async getBadgeBoard(userId: UserId): Promise<Result<BadgeBoard, EngagementError>> {
    const userRes = await this.loadUser(userId);
    if (userRes.isErr()) return ErrResult(userRes.error);
    const stats = statsFromUser(userRes.unwrap());

    const awardsRes = await this.getAwards(userId);
    if (awardsRes.isErr()) return ErrResult(awardsRes.error);
    const awardedAt = new Map(
      awardsRes.unwrap().map((award) => [award.badgeId, award.awardedAt]),
    );

    const byCategory = emptyCategoryCounts();

    const entries = this.deps.catalog.badges.map((badge) => {
      const at = awardedAt.get(badge.id) ?? null;
      const bucket = byCategory[badge.category];
      bucket.total += 1;
      if (at) bucket.held += 1;
      return {
        badge,
        held: at !== null,
        awardedAt: at,
        progress: criteriaProgress(badge.criteria, stats),
      };
    });

    return OkResult({
      userId,
      entries,
      heldCount: entries.filter((entry) => entry.held).length,
      totalCount: entries.length,
      byCategory,
    });
  }

  private async loadUser(
    userId: UserId,
  ): Promise<Result<EngagementUser, EngagementError>> {
    const res = await this.deps.users.get(userId);
    if (res.isErr()) return ErrResult(storeUnavailable("Badges", res.error));
    const user = res.unwrap();
    if (!user) {
      return ErrResult(new EngagementError("USER_NOT_FOUND", `Unknown user ${userId}`));
    }
    return OkResult(user);
  }
}
