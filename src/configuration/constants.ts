/**
 * Defaults and hard bounds for engine configuration.
 *
 * Invariants:
 * - Every configurable value has a default here; the environment only
 *   overrides.
 * - Bounds are enforced by the schema in `definitions.ts`.
 */
export const CONFIG_DEFAULTS = {
  store: "mongo",
  dbName: "memeboard",
  allowSelfLike: false,
  maxCommentLength: 2000,
  bonusMin: 20,
  bonusMax: 100,
  trendingLikeWeight: 1,
  trendingCommentWeight: 2,
  trendingRefreshMs: 5 * 60 * 1000,
  leaderboardMaxLimit: 100,
} as const;

export const CONFIG_BOUNDS = {
  maxCommentLength: { min: 1, max: 10_000 },
  bonus: { min: 1, max: 10_000 },
  trendingRefreshMs: { min: 1_000, max: 24 * 60 * 60 * 1000 },
  leaderboardMaxLimit: { min: 1, max: 1_000 },
} as const;

export const STORE_BACKENDS = ["mongo", "memory"] as const;
export type StoreBackend = (typeof STORE_BACKENDS)[number];
