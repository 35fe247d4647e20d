/**
 * Rank ladder.
 *
 * A monotonic step function of total points: a user holds the highest rank
 * whose threshold they have reached, so exactly hitting a threshold grants
 * that rank. Totals below zero still map to the first rank.
 */
import { RANK_NAMES, type RankName } from "@/db/schemas/user";
import type { LevelInfo, NextRankInfo } from "../users/types";

export interface RankTier {
  readonly name: RankName;
  readonly minPoints: number;
}

export const RANK_TABLE: ReadonlyArray<RankTier> = Object.freeze([
  { name: "Newbie", minPoints: 0 },
  { name: "Rookie Memer", minPoints: 50 },
  { name: "Meme Enthusiast", minPoints: 200 },
  { name: "Pro Memer", minPoints: 500 },
  { name: "Meme Legend", minPoints: 1_000 },
]);

/** Position of `rank` on the ladder, 0 for the first tier. */
export function rankIndex(rank: RankName): number {
  return RANK_NAMES.indexOf(rank);
}

export function getRankForPoints(totalPoints: number): RankName {
  let rank: RankName = "Newbie";
  for (const tier of RANK_TABLE) {
    if (totalPoints >= tier.minPoints) {
      rank = tier.name;
    } else {
      break;
    }
  }
  return rank;
}

export function isRankAtLeast(rank: RankName, atLeast: RankName): boolean {
  return rankIndex(rank) >= rankIndex(atLeast);
}

/** Next tier, points still needed and percent through the current tier. */
export function getNextRank(totalPoints: number): NextRankInfo | null {
  const current = rankIndex(getRankForPoints(totalPoints));
  const floor = RANK_TABLE[current];
  const next = RANK_TABLE[current + 1];
  if (!floor || !next) return null;

  const span = next.minPoints - floor.minPoints;
  const earned = Math.max(0, totalPoints - floor.minPoints);
  return {
    rank: next.name,
    threshold: next.minPoints,
    pointsNeeded: next.minPoints - totalPoints,
    progressPercent: Math.min(100, Math.floor((earned / span) * 100)),
  };
}

export const POINTS_PER_LEVEL = 100;

/** Level 1 starts at 0 points; negative totals stay at level 1. */
export function getLevel(totalPoints: number): LevelInfo {
  const points = Math.max(0, totalPoints);
  const pointsInLevel = points % POINTS_PER_LEVEL;
  return {
    level: Math.floor(points / POINTS_PER_LEVEL) + 1,
    pointsInLevel,
    pointsToNext: POINTS_PER_LEVEL - pointsInLevel,
    progressPercent: Math.floor((pointsInLevel / POINTS_PER_LEVEL) * 100),
  };
}
