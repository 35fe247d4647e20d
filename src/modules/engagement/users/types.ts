import type { LoginStreak, RankName, UserDoc, UserStats } from "@/db/schemas/user";
import type { UserId } from "@/db/types";

export type { LoginStreak, RankName, UserStats };
export type EngagementUser = UserDoc;

export interface NewUserInput {
  readonly userId: UserId;
  readonly displayName: string;
  readonly createdAt: Date;
}

export interface RegisterOutcome {
  readonly user: EngagementUser;
  readonly created: boolean;
}

export interface StreakUpdate {
  readonly before: LoginStreak;
  readonly after: LoginStreak;
  readonly changed: boolean;
}

export interface NextRankInfo {
  readonly rank: RankName;
  readonly threshold: number;
  readonly pointsNeeded: number;
  readonly progressPercent: number;
}

/** Flat progression beside the rank ladder: one level per 100 points. */
export interface LevelInfo {
  readonly level: number;
  readonly pointsInLevel: number;
  readonly pointsToNext: number;
  readonly progressPercent: number;
}

export interface HeldBadge {
  readonly badgeId: string;
  readonly name: string;
  readonly emoji: string;
  readonly awardedAt: Date;
}

export interface UserProfile {
  readonly userId: UserId;
  readonly displayName: string;
  readonly totalPoints: number;
  readonly rank: RankName;
  readonly nextRank: NextRankInfo | null;
  readonly level: LevelInfo;
  readonly stats: UserStats;
  /** `current` reads 0 once a day has been missed. */
  readonly streak: LoginStreak;
  readonly badges: HeldBadge[];
  readonly createdAt: Date;
}

export function createUserDoc(input: NewUserInput): EngagementUser {
  return {
    _id: input.userId,
    displayName: input.displayName,
    totalPoints: 0,
    rank: "Newbie",
    stats: { memesCreated: 0, likesReceived: 0, commentsMade: 0 },
    streak: { lastLoginDay: null, current: 0, best: 0 },
    createdAt: input.createdAt,
    updatedAt: input.createdAt,
  };
}
