/**
 * Zod schema for persisted user documents.
 * Purpose: single source of truth for the user shape. `totalPoints` and `rank`
 * are derived from the ledger and only written alongside a ledger row.
 */
import { z } from "zod";

export const RANK_NAMES = [
  "Newbie",
  "Rookie Memer",
  "Meme Enthusiast",
  "Pro Memer",
  "Meme Legend",
] as const;

export const RankNameSchema = z.enum(RANK_NAMES);

export const UserStatsSchema = z.object({
  memesCreated: z.number().int().nonnegative(),
  likesReceived: z.number().int().nonnegative(),
  commentsMade: z.number().int().nonnegative(),
});

export const LoginStreakSchema = z.object({
  /** UTC day stamp of the last recorded login. */
  lastLoginDay: z.number().int().nullable(),
  current: z.number().int().nonnegative(),
  best: z.number().int().nonnegative(),
});

export const UserSchema = z.object({
  _id: z.string(),
  displayName: z.string(),
  totalPoints: z.number().int(),
  rank: RankNameSchema,
  stats: UserStatsSchema,
  streak: LoginStreakSchema,
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type RankName = z.infer<typeof RankNameSchema>;
export type UserStats = z.infer<typeof UserStatsSchema>;
export type LoginStreak = z.infer<typeof LoginStreakSchema>;
export type UserDoc = z.infer<typeof UserSchema>;
