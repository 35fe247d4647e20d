/**
 * Engine configuration contract.
 *
 * `EnvSchema` validates raw environment strings; `toEngagementConfig` maps the
 * parsed values onto the structured `EngagementConfig` the services consume.
 */
import { z } from "zod";
import {
  CONFIG_BOUNDS,
  CONFIG_DEFAULTS,
  STORE_BACKENDS,
  type StoreBackend,
} from "./constants";

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const intInRange = (fallback: number, bounds: { min: number; max: number }) =>
  z.coerce.number().int().min(bounds.min).max(bounds.max).default(fallback);

export const EnvSchema = z
  .object({
    ENGAGEMENT_STORE: z.enum(STORE_BACKENDS).default(CONFIG_DEFAULTS.store),
    MONGO_URI: z.string().min(1).optional(),
    DB_NAME: z.string().min(1).default(CONFIG_DEFAULTS.dbName),
    ALLOW_SELF_LIKE: booleanFlag(CONFIG_DEFAULTS.allowSelfLike),
    MAX_COMMENT_LENGTH: intInRange(
      CONFIG_DEFAULTS.maxCommentLength,
      CONFIG_BOUNDS.maxCommentLength,
    ),
    BONUS_MIN: intInRange(CONFIG_DEFAULTS.bonusMin, CONFIG_BOUNDS.bonus),
    BONUS_MAX: intInRange(CONFIG_DEFAULTS.bonusMax, CONFIG_BOUNDS.bonus),
    TRENDING_LIKE_WEIGHT: z.coerce
      .number()
      .nonnegative()
      .default(CONFIG_DEFAULTS.trendingLikeWeight),
    TRENDING_COMMENT_WEIGHT: z.coerce
      .number()
      .nonnegative()
      .default(CONFIG_DEFAULTS.trendingCommentWeight),
    TRENDING_REFRESH_MS: intInRange(
      CONFIG_DEFAULTS.trendingRefreshMs,
      CONFIG_BOUNDS.trendingRefreshMs,
    ),
    LEADERBOARD_MAX_LIMIT: intInRange(
      CONFIG_DEFAULTS.leaderboardMaxLimit,
      CONFIG_BOUNDS.leaderboardMaxLimit,
    ),
  })
  .refine((env) => env.BONUS_MIN <= env.BONUS_MAX, {
    message: "BONUS_MIN must not exceed BONUS_MAX",
    path: ["BONUS_MIN"],
  })
  .refine((env) => env.ENGAGEMENT_STORE !== "mongo" || !!env.MONGO_URI, {
    message: "MONGO_URI is required when ENGAGEMENT_STORE=mongo",
    path: ["MONGO_URI"],
  });

export type ParsedEnv = z.infer<typeof EnvSchema>;

export interface TrendingWeights {
  readonly like: number;
  readonly comment: number;
}

export interface EngagementConfig {
  readonly store: StoreBackend;
  readonly mongo: { readonly uri?: string; readonly dbName: string };
  readonly allowSelfLike: boolean;
  readonly maxCommentLength: number;
  readonly bonus: { readonly min: number; readonly max: number };
  readonly trending: {
    readonly weights: TrendingWeights;
    readonly refreshIntervalMs: number;
  };
  readonly leaderboard: { readonly maxLimit: number };
}

export function toEngagementConfig(env: ParsedEnv): EngagementConfig {
  return {
    store: env.ENGAGEMENT_STORE,
    mongo: { uri: env.MONGO_URI, dbName: env.DB_NAME },
    allowSelfLike: env.ALLOW_SELF_LIKE,
    maxCommentLength: env.MAX_COMMENT_LENGTH,
    bonus: { min: env.BONUS_MIN, max: env.BONUS_MAX },
    trending: {
      weights: {
        like: env.TRENDING_LIKE_WEIGHT,
        comment: env.TRENDING_COMMENT_WEIGHT,
      },
      refreshIntervalMs: env.TRENDING_REFRESH_MS,
    },
    leaderboard: { maxLimit: env.LEADERBOARD_MAX_LIMIT },
  };
}

export const DEFAULT_ENGAGEMENT_CONFIG: EngagementConfig = {
  store: "memory",
  mongo: { dbName: CONFIG_DEFAULTS.dbName },
  allowSelfLike: CONFIG_DEFAULTS.allowSelfLike,
  maxCommentLength: CONFIG_DEFAULTS.maxCommentLength,
  bonus: { min: CONFIG_DEFAULTS.bonusMin, max: CONFIG_DEFAULTS.bonusMax },
  trending: {
    weights: {
      like: CONFIG_DEFAULTS.trendingLikeWeight,
      comment: CONFIG_DEFAULTS.trendingCommentWeight,
    },
    refreshIntervalMs: CONFIG_DEFAULTS.trendingRefreshMs,
  },
  leaderboard: { maxLimit: CONFIG_DEFAULTS.leaderboardMaxLimit },
};
