/**
 * Configuration entrypoint.
 *
 * Loads `.env` (via dotenv) and validates the environment with Zod. Invalid
 * values fail the load with one line per offending variable.
 */
import "dotenv/config";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  DEFAULT_ENGAGEMENT_CONFIG,
  EnvSchema,
  toEngagementConfig,
  type EngagementConfig,
} from "./definitions";

export * from "./constants";
export * from "./definitions";

export function loadEngagementConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<EngagementConfig, Error> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    return ErrResult(new Error(`Invalid engagement configuration: ${details}`));
  }
  return OkResult(toEngagementConfig(parsed.data));
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Defaults merged with explicit overrides; used by tests and embedders. */
export function resolveEngagementConfig(
  overrides: DeepPartial<EngagementConfig> = {},
): EngagementConfig {
  const base = DEFAULT_ENGAGEMENT_CONFIG;
  return {
    store: overrides.store ?? base.store,
    mongo: { ...base.mongo, ...overrides.mongo },
    allowSelfLike: overrides.allowSelfLike ?? base.allowSelfLike,
    maxCommentLength: overrides.maxCommentLength ?? base.maxCommentLength,
    bonus: { ...base.bonus, ...overrides.bonus },
    trending: {
      weights: { ...base.trending.weights, ...overrides.trending?.weights },
      refreshIntervalMs:
        overrides.trending?.refreshIntervalMs ??
        base.trending.refreshIntervalMs,
    },
    leaderboard: { ...base.leaderboard, ...overrides.leaderboard },
  };
}
