/**
 * Pure evaluation of badge criteria against a statistics snapshot.
 */
import { isRankAtLeast } from "../ledger/ranks";
import type { EngagementUser } from "../users/types";
import type { BadgeCriteria, BadgeProgress, BadgeStat, BadgeStats } from "./types";

export function statsFromUser(user: EngagementUser): BadgeStats {
  return {
    memesCreated: user.stats.memesCreated,
    likesReceived: user.stats.likesReceived,
    commentsMade: user.stats.commentsMade,
    loginStreak: user.streak.current,
    totalPoints: user.totalPoints,
    rank: user.rank,
  };
}

export function isSatisfied(criteria: BadgeCriteria, stats: BadgeStats): boolean {
  switch (criteria.type) {
    case "threshold":
      return stats[criteria.stat] >= criteria.min;
    case "streak":
      return stats.loginStreak >= criteria.days;
    case "rank":
      return isRankAtLeast(stats.rank, criteria.atLeast);
    case "ratio": {
      const denominator = stats[criteria.denominator];
      if (denominator < criteria.minDenominator || denominator <= 0) return false;
      return stats[criteria.numerator] / denominator >= criteria.min;
    }
    case "all":
      return criteria.criteria.every((inner) => isSatisfied(inner, stats));
  }
}

/** Statistics whose change can flip the criterion. */
export function criteriaStats(criteria: BadgeCriteria): Set<BadgeStat> {
  switch (criteria.type) {
    case "threshold":
      return new Set([criteria.stat]);
    case "streak":
      return new Set(["loginStreak"]);
    case "rank":
      return new Set(["rank"]);
    case "ratio":
      return new Set([criteria.numerator, criteria.denominator]);
    case "all": {
      const stats = new Set<BadgeStat>();
      for (const inner of criteria.criteria) {
        for (const stat of criteriaStats(inner)) stats.add(stat);
      }
      return stats;
    }
  }
}

export function criteriaProgress(
  criteria: BadgeCriteria,
  stats: BadgeStats,
): BadgeProgress | null {
  const progress = (current: number, target: number): BadgeProgress => ({
    current: Math.min(current, target),
    target,
    percent: Math.min(100, Math.floor((Math.max(0, current) / target) * 100)),
  });

  switch (criteria.type) {
    case "threshold":
      return progress(stats[criteria.stat], criteria.min);
    case "streak":
      return progress(stats.loginStreak, criteria.days);
    default:
      return null;
  }
}
