/**
 * Index bootstrap for the engagement collections.
 *
 * The unique indexes here carry correctness, not just speed: replayed ledger
 * keys and duplicate likes are rejected by them. `ensureEngagementIndexes`
 * is idempotent and must run before the engine takes writes.
 */
import type { CreateIndexesOptions, IndexSpecification } from "mongodb";
import { getDb } from "./mongo";

export interface IndexDefinition {
  readonly collection: string;
  readonly key: IndexSpecification;
  readonly options: CreateIndexesOptions & { name: string };
}

export const ENGAGEMENT_INDEXES: readonly IndexDefinition[] = [
  {
    collection: "users",
    key: { totalPoints: -1, createdAt: 1, _id: 1 },
    options: { name: "leaderboard_idx" },
  },
  {
    collection: "point_transactions",
    key: { idempotencyKey: 1 },
    options: { name: "idempotency_key_unique", unique: true },
  },
  {
    collection: "point_transactions",
    key: { userId: 1, createdAt: -1 },
    options: { name: "user_time_idx" },
  },
  {
    collection: "memes",
    key: { ownerId: 1, createdAt: -1 },
    options: { name: "owner_time_idx" },
  },
  {
    collection: "likes",
    key: { userId: 1, memeId: 1 },
    options: { name: "user_meme_unique", unique: true },
  },
  {
    collection: "likes",
    key: { createdAt: 1, memeId: 1 },
    options: { name: "time_meme_idx" },
  },
  {
    collection: "comments",
    key: { memeId: 1, createdAt: 1 },
    options: { name: "meme_time_idx" },
  },
  {
    collection: "comments",
    key: { createdAt: 1, memeId: 1 },
    options: { name: "time_meme_idx" },
  },
  {
    collection: "badge_awards",
    key: { userId: 1, awardedAt: 1 },
    options: { name: "user_awarded_idx" },
  },
  {
    collection: "activity",
    key: { userId: 1, createdAt: -1 },
    options: { name: "user_time_idx" },
  },
];

export async function ensureEngagementIndexes(): Promise<void> {
  const db = await getDb();
  for (const index of ENGAGEMENT_INDEXES) {
    try {
      await db.collection(index.collection).createIndex(index.key, index.options);
    } catch (error) {
      console.error(
        `[Indexes] failed to create ${index.collection}.${index.options.name}:`,
        error,
      );
      throw error;
    }
  }
  console.log(`[Indexes] ensured ${ENGAGEMENT_INDEXES.length} engagement indexes`);
}
