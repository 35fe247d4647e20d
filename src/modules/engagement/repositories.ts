/**
 * Repository sets per storage backend. Both satisfy the same interfaces and
 * the same atomicity/uniqueness guarantees; services never know which one
 * they talk to.
 */
import { MemoryDatabase } from "@/db/memory";
import { activityRepository, type ActivityRepository } from "./activity/repository";
import { MemoryActivityRepository } from "./activity/repository.memory";
import { badgeAwardRepository, type BadgeAwardRepository } from "./badges/repository";
import { MemoryBadgeAwardRepository } from "./badges/repository.memory";
import {
  interactionsRepository,
  type InteractionsRepository,
} from "./interactions/repository";
import { MemoryInteractionsRepository } from "./interactions/repository.memory";
import { trendingViewRepository, type TrendingViewRepository } from "./leaderboard/repository";
import { MemoryTrendingViewRepository } from "./leaderboard/repository.memory";
import { ledgerRepository, type LedgerRepository } from "./ledger/repository";
import { MemoryLedgerRepository } from "./ledger/repository.memory";
import { memesRepository, type MemesRepository } from "./memes/repository";
import { MemoryMemesRepository } from "./memes/repository.memory";
import { usersRepository, type UsersRepository } from "./users/repository";
import { MemoryUsersRepository } from "./users/repository.memory";

export interface EngagementRepositories {
  readonly users: UsersRepository;
  readonly ledger: LedgerRepository;
  readonly memes: MemesRepository;
  readonly interactions: InteractionsRepository;
  readonly awards: BadgeAwardRepository;
  readonly activity: ActivityRepository;
  readonly trending: TrendingViewRepository;
}

export function createMongoRepositories(): EngagementRepositories {
  return {
    users: usersRepository,
    ledger: ledgerRepository,
    memes: memesRepository,
    interactions: interactionsRepository,
    awards: badgeAwardRepository,
    activity: activityRepository,
    trending: trendingViewRepository,
  };
}

export function createMemoryRepositories(
  db: MemoryDatabase = new MemoryDatabase(),
): EngagementRepositories & { readonly db: MemoryDatabase } {
  return {
    db,
    users: new MemoryUsersRepository(db),
    ledger: new MemoryLedgerRepository(db),
    memes: new MemoryMemesRepository(db),
    interactions: new MemoryInteractionsRepository(db),
    awards: new MemoryBadgeAwardRepository(db),
    activity: new MemoryActivityRepository(db),
    trending: new MemoryTrendingViewRepository(db),
  };
}
