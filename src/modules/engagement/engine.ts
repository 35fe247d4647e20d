/**
 * Engagement engine facade.
 *
 * Wires the services over one repository set, one hook set and one clock,
 * and exposes the operations the presentation layer calls. Every operation
 * returns `Result<T, EngagementError>`; nothing throws a storage exception.
 */
import { configureMongo } from "@/db/mongo";
import type { MemeId, UserId } from "@/db/types";
import { createEngagementHooks, type EngagementHooks } from "@/events/hooks/engagement";
import { resolveEngagementConfig, type EngagementConfig } from "@/configuration";
import type { Result } from "@/utils/result";
import { describeActivity } from "./activity/format";
import { ActivityService } from "./activity/service";
import type { Activity, AppendActivityInput } from "./activity/types";
import { DEFAULT_BADGE_CATALOG, type BadgeCatalog } from "./badges/catalog";
import { BadgeService } from "./badges/service";
import type { AwardedBadge, BadgeBoard, BadgeStat } from "./badges/types";
import { DailyLoginService, type LoginOutcome } from "./daily/service";
import type { EngagementError } from "./errors";
import type { PageOptions } from "./ids";
import { InteractionService } from "./interactions/service";
import type {
  AddCommentOptions,
  Comment,
  CommentThread,
  Like,
  TimeWindow,
} from "./interactions/types";
import {
  startTrendingRefresh,
  type TrendingRefreshHandle,
} from "./leaderboard/refresh";
import { LeaderboardService } from "./leaderboard/service";
import { TrendingService, type RefreshOptions } from "./leaderboard/trending";
import type {
  LeaderboardEntry,
  RefreshOutcome,
  TrendingMeme,
  TrendingWindowKey,
} from "./leaderboard/types";
import type { LedgerEvent } from "./ledger/policy";
import { LedgerService } from "./ledger/service";
import type { PointTransaction, ReconcileReport, RecordOutcome } from "./ledger/types";
import { MemesService } from "./memes/service";
import type { CreateMemeInput, CreateMemeOutcome } from "./memes/types";
import {
  createMemoryRepositories,
  createMongoRepositories,
  type EngagementRepositories,
} from "./repositories";
import { UsersService } from "./users/service";
import type { RegisterOutcome, UserProfile } from "./users/types";

export interface EngagementEngineOptions {
  readonly config?: EngagementConfig;
  /** Overrides the backend chosen by `config.store`. */
  readonly repositories?: EngagementRepositories;
  readonly catalog?: BadgeCatalog;
  readonly hooks?: EngagementHooks;
  readonly clock?: () => Date;
}

export class EngagementEngine {
  readonly config: EngagementConfig;
  readonly hooks: EngagementHooks;
  readonly repositories: EngagementRepositories;

  readonly activity: ActivityService;
  readonly badges: BadgeService;
  readonly ledger: LedgerService;
  readonly users: UsersService;
  readonly memes: MemesService;
  readonly interactions: InteractionService;
  readonly daily: DailyLoginService;
  readonly leaderboard: LeaderboardService;
  readonly trendingService: TrendingService;

  constructor(options: EngagementEngineOptions = {}) {
    this.config = options.config ?? resolveEngagementConfig();
    this.hooks = options.hooks ?? createEngagementHooks();
    this.repositories = options.repositories ?? selectRepositories(this.config);
    const clock = options.clock ?? (() => new Date());
    const catalog = options.catalog ?? DEFAULT_BADGE_CATALOG;
    const repos = this.repositories;

    this.activity = new ActivityService(repos.activity, clock);
    this.badges = new BadgeService({
      users: repos.users,
      awards: repos.awards,
      activity: this.activity,
      hooks: this.hooks,
      catalog,
      clock,
    });
    this.ledger = new LedgerService({
      ledger: repos.ledger,
      activity: this.activity,
      badges: this.badges,
      hooks: this.hooks,
      bonus: this.config.bonus,
      clock,
    });
    this.users = new UsersService({
      users: repos.users,
      awards: repos.awards,
      catalog,
      clock,
    });
    this.memes = new MemesService({
      memes: repos.memes,
      users: repos.users,
      ledger: this.ledger,
      activity: this.activity,
      badges: this.badges,
      hooks: this.hooks,
      clock,
    });
    this.trendingService = new TrendingService({
      views: repos.trending,
      interactions: repos.interactions,
      memes: repos.memes,
      weights: this.config.trending.weights,
      maxViewAgeMs: this.config.trending.refreshIntervalMs,
      clock,
    });
    this.interactions = new InteractionService({
      users: repos.users,
      memes: repos.memes,
      interactions: repos.interactions,
      ledger: this.ledger,
      activity: this.activity,
      badges: this.badges,
      trending: this.trendingService,
      hooks: this.hooks,
      policy: {
        allowSelfLike: this.config.allowSelfLike,
        maxCommentLength: this.config.maxCommentLength,
      },
      clock,
    });
    this.daily = new DailyLoginService({
      users: repos.users,
      ledger: this.ledger,
      activity: this.activity,
      badges: this.badges,
      clock,
    });
    this.leaderboard = new LeaderboardService({
      users: repos.users,
      maxLimit: this.config.leaderboard.maxLimit,
    });
  }

  // Users & points -----------------------------------------------------------

  registerUser(userId: UserId, displayName: string): Promise<Result<RegisterOutcome, EngagementError>> {
    return this.users.registerUser(userId, displayName);
  }

  getProfile(userId: UserId): Promise<Result<UserProfile, EngagementError>> {
    return this.users.getProfile(userId);
  }

  record(event: LedgerEvent): Promise<Result<RecordOutcome, EngagementError>> {
    return this.ledger.record(event);
  }

  awardBonus(
    userId: UserId,
    amount: number,
    note: string,
    idempotencyKey: string,
  ): Promise<Result<RecordOutcome, EngagementError>> {
    return this.ledger.awardBonus({ userId, amount, note, idempotencyKey });
  }

  recordLogin(userId: UserId, at?: Date): Promise<Result<LoginOutcome, EngagementError>> {
    return this.daily.recordLogin(userId, at);
  }

  history(
    userId: UserId,
    page?: PageOptions,
  ): Promise<Result<PointTransaction[], EngagementError>> {
    return this.ledger.history(userId, page);
  }

  reconcile(userId: UserId): Promise<Result<ReconcileReport, EngagementError>> {
    return this.ledger.reconcile(userId);
  }

  // Content & interactions ---------------------------------------------------

  createMeme(input: CreateMemeInput): Promise<Result<CreateMemeOutcome, EngagementError>> {
    return this.memes.createMeme(input);
  }

  addLike(userId: UserId, memeId: MemeId): Promise<Result<Like, EngagementError>> {
    return this.interactions.addLike(userId, memeId);
  }

  removeLike(userId: UserId, memeId: MemeId): Promise<Result<void, EngagementError>> {
    return this.interactions.removeLike(userId, memeId);
  }

  addComment(
    userId: UserId,
    memeId: MemeId,
    body: string,
    options?: AddCommentOptions,
  ): Promise<Result<Comment, EngagementError>> {
    return this.interactions.addComment(userId, memeId, body, options);
  }

  listComments(memeId: MemeId): Promise<Result<CommentThread[], EngagementError>> {
    return this.interactions.listComments(memeId);
  }

  // Badges -------------------------------------------------------------------

  evaluateBadges(
    userId: UserId,
    triggers?: readonly BadgeStat[],
  ): Promise<Result<AwardedBadge[], EngagementError>> {
    return this.badges.evaluate(userId, triggers);
  }

  getBadgeBoard(userId: UserId): Promise<Result<BadgeBoard, EngagementError>> {
    return this.badges.getBadgeBoard(userId);
  }

  // Rankings -----------------------------------------------------------------

  topByPoints(limit: number, offset?: number): Promise<Result<LeaderboardEntry[], EngagementError>> {
    return this.leaderboard.topByPoints(limit, offset);
  }

  positionOf(userId: UserId): Promise<Result<number | null, EngagementError>> {
    return this.leaderboard.positionOf(userId);
  }

  trending(
    window: TrendingWindowKey | TimeWindow,
    limit?: number,
  ): Promise<Result<TrendingMeme[], EngagementError>> {
    return this.trendingService.trending(window, limit);
  }

  refreshTrending(
    key: TrendingWindowKey,
    options?: RefreshOptions,
  ): Promise<Result<RefreshOutcome, EngagementError>> {
    return this.trendingService.refresh(key, options);
  }

  startTrendingRefresh(
    options: { intervalMs?: number; runImmediately?: boolean } = {},
  ): TrendingRefreshHandle {
    return startTrendingRefresh(this.trendingService, {
      intervalMs: options.intervalMs ?? this.config.trending.refreshIntervalMs,
      runImmediately: options.runImmediately,
    });
  }

  // Activity -----------------------------------------------------------------

  appendActivity(input: AppendActivityInput): Promise<Result<Activity, EngagementError>> {
    return this.activity.append(input);
  }

  listActivity(
    userId: UserId,
    page?: PageOptions,
  ): Promise<Result<Activity[], EngagementError>> {
    return this.activity.list(userId, page);
  }

  describeActivity(activity: Activity): string {
    return describeActivity(activity);
  }
}

function selectRepositories(config: EngagementConfig): EngagementRepositories {
  if (config.store === "memory") return createMemoryRepositories();
  configureMongo({ uri: config.mongo.uri, dbName: config.mongo.dbName });
  return createMongoRepositories();
}

export function createEngagementEngine(
  options: EngagementEngineOptions = {},
): EngagementEngine {
  return new EngagementEngine(options);
}
