/**
 * Badge Types.
 *
 * Purpose: badge definitions, the closed set of criteria variants and the
 * statistics snapshot they are evaluated against.
 */
import { z } from "zod";
import type { BadgeAwardDoc } from "@/db/schemas/badge";
import { RankNameSchema, type RankName } from "@/db/schemas/user";

export const BADGE_CATEGORIES = [
  "creator",
  "social",
  "achievement",
  "time_based",
  "quality",
] as const;

export type BadgeCategory = (typeof BADGE_CATEGORIES)[number];

export const CATEGORY_DISPLAY: Record<BadgeCategory, { name: string; emoji: string }> = {
  creator: { name: "Creator", emoji: "🎨" },
  social: { name: "Social", emoji: "💬" },
  achievement: { name: "Achievement", emoji: "🏅" },
  time_based: { name: "Time-based", emoji: "📅" },
  quality: { name: "Quality", emoji: "🏆" },
};

/** Read-only statistics a criterion can look at. */
export interface BadgeStats {
  readonly memesCreated: number;
  readonly likesReceived: number;
  readonly commentsMade: number;
  readonly loginStreak: number;
  readonly totalPoints: number;
  readonly rank: RankName;
}

export type BadgeStat = keyof BadgeStats;
export type CounterStat = Exclude<BadgeStat, "rank">;

export const COUNTER_STATS = [
  "memesCreated",
  "likesReceived",
  "commentsMade",
  "loginStreak",
  "totalPoints",
] as const satisfies readonly CounterStat[];

export type BadgeCriteria =
  | { type: "threshold"; stat: CounterStat; min: number }
  | { type: "streak"; days: number }
  | { type: "rank"; atLeast: RankName }
  | {
      type: "ratio";
      numerator: CounterStat;
      denominator: CounterStat;
      min: number;
      minDenominator: number;
    }
  | { type: "all"; criteria: BadgeCriteria[] };

const CounterStatSchema = z.enum(COUNTER_STATS);

export const BadgeCriteriaSchema: z.ZodType<BadgeCriteria> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("threshold"),
      stat: CounterStatSchema,
      min: z.number().int().positive(),
    }),
    z.object({ type: z.literal("streak"), days: z.number().int().positive() }),
    z.object({ type: z.literal("rank"), atLeast: RankNameSchema }),
    z.object({
      type: z.literal("ratio"),
      numerator: CounterStatSchema,
      denominator: CounterStatSchema,
      min: z.number().positive(),
      minDenominator: z.number().int().positive(),
    }),
    z.object({
      type: z.literal("all"),
      criteria: z.array(BadgeCriteriaSchema).min(1),
    }),
  ]),
);

export const BadgeDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string().min(1),
  description: z.string().min(1),
  emoji: z.string().min(1),
  category: z.enum(BADGE_CATEGORIES),
  criteria: BadgeCriteriaSchema,
});

export type BadgeDefinition = z.infer<typeof BadgeDefinitionSchema>;
export type BadgeAward = BadgeAwardDoc;

export interface BadgeProgress {
  readonly current: number;
  readonly target: number;
  readonly percent: number;
}

export interface BadgeBoardEntry {
  readonly badge: BadgeDefinition;
  readonly held: boolean;
  readonly awardedAt: Date | null;
  /** Only for single-counter criteria (threshold, streak). */
  readonly progress: BadgeProgress | null;
}

export interface BadgeBoard {
  readonly userId: string;
  readonly entries: BadgeBoardEntry[];
  readonly heldCount: number;
  readonly totalCount: number;
  readonly byCategory: Record<BadgeCategory, { held: number; total: number }>;
}

/** A badge newly granted by an evaluation. */
export interface AwardedBadge {
  readonly badge: BadgeDefinition;
  readonly award: BadgeAward;
}

export class BadgeCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadgeCatalogError";
  }
}
