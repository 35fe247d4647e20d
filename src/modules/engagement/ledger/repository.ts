/**
 * Ledger Repository.
 *
 * Purpose: append point transactions and keep `users.totalPoints` / `rank` in
 * step with them.
 * Invariants:
 * - The transaction row, the balance increment and the rank update commit in
 *   one MongoDB transaction; either all three land or none does.
 * - `idempotencyKey` has a unique index. A replay (sequential or concurrent)
 *   ends as `duplicate` carrying the row that won.
 * - Ledger rows are never updated or deleted.
 */
import type { ClientSession } from "mongodb";
import { isDuplicateKeyError, toError } from "@/db/helpers";
import { MongoStore } from "@/db/mongo-store";
import { PointTransactionSchema, type PointTransactionDoc } from "@/db/schemas/ledger";
import { runInTransaction } from "@/db/transaction";
import type { UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { clampPageSize, type PageOptions } from "../ids";
import { UsersStore } from "../users/repository";
import { getRankForPoints } from "./ranks";
import type {
  AppendOutcome,
  NewPointTransaction,
  PointTransaction,
  ReconcileSnapshot,
} from "./types";

export const TRANSACTIONS_COLLECTION = "point_transactions";
export const TransactionsStore = new MongoStore<PointTransactionDoc>(
  TRANSACTIONS_COLLECTION,
  PointTransactionSchema,
);

export interface LedgerRepository {
  append(transaction: NewPointTransaction): Promise<Result<AppendOutcome, Error>>;
  findByKey(idempotencyKey: string): Promise<Result<PointTransaction | null, Error>>;
  /** Newest first. */
  listForUser(
    userId: UserId,
    page?: PageOptions,
  ): Promise<Result<PointTransaction[], Error>>;
  sumForUser(userId: UserId): Promise<Result<number, Error>>;
  /**
   * Recompute the user's total and rank from the ledger and store them.
   * `Ok(null)` when the user does not exist.
   */
  reconcile(userId: UserId, at: Date): Promise<Result<ReconcileSnapshot | null, Error>>;
}

async function sumAmounts(userId: UserId, session?: ClientSession): Promise<number> {
  const col = await TransactionsStore.collection();
  const rows = await col
    .aggregate<{ total: number }>(
      [
        { $match: { userId } },
        { $group: { _id: null, total: { $sum: "$amount" } } },
      ],
      { session },
    )
    .toArray();
  return rows[0]?.total ?? 0;
}

class LedgerRepositoryImpl implements LedgerRepository {
  async append(transaction: NewPointTransaction): Promise<Result<AppendOutcome, Error>> {
    try {
      const outcome = await runInTransaction<AppendOutcome>(async (session) => {
        const txCol = await TransactionsStore.collection();
        const userCol = await UsersStore.collection();

        const existing = await txCol.findOne(
          { idempotencyKey: transaction.idempotencyKey },
          { session },
        );
        const replayed = existing ? TransactionsStore.parse(existing) : null;
        if (replayed) return { status: "duplicate", transaction: replayed };

        const raw = await userCol.findOneAndUpdate(
          { _id: transaction.userId },
          {
            $inc: { totalPoints: transaction.amount },
            $set: { updatedAt: transaction.createdAt },
          },
          { session, returnDocument: "before" },
        );
        const before = raw ? UsersStore.parse(raw) : null;
        if (!before) return { status: "missing_user" };

        const balanceAfter = before.totalPoints + transaction.amount;
        const row: PointTransaction = { ...transaction, balanceAfter };
        // Unique index on idempotencyKey rejects a concurrent twin here.
        await txCol.insertOne(row, { session });

        const rankAfter = getRankForPoints(balanceAfter);
        if (rankAfter !== before.rank) {
          await userCol.updateOne(
            { _id: transaction.userId },
            { $set: { rank: rankAfter } },
            { session },
          );
        }

        return {
          status: "applied",
          transaction: row,
          balanceBefore: before.totalPoints,
          balanceAfter,
          rankBefore: before.rank,
          rankAfter,
        };
      });
      return OkResult(outcome);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const winner = await this.findByKey(transaction.idempotencyKey);
        if (winner.isErr()) return ErrResult(winner.error);
        const row = winner.unwrap();
        if (row) return OkResult({ status: "duplicate", transaction: row });
      }
      console.error("[LedgerRepository] append error:", error);
      return ErrResult(toError(error));
    }
  }

  findByKey(idempotencyKey: string): Promise<Result<PointTransaction | null, Error>> {
    return TransactionsStore.findOne({ idempotencyKey });
  }

  listForUser(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<PointTransaction[], Error>> {
    const filter = page.before
      ? { userId, createdAt: { $lt: page.before } }
      : { userId };
    return TransactionsStore.find(filter, {
      sort: { createdAt: -1, _id: -1 },
      limit: clampPageSize(page.limit),
    });
  }

  async sumForUser(userId: UserId): Promise<Result<number, Error>> {
    try {
      return OkResult(await sumAmounts(userId));
    } catch (error) {
      console.error("[LedgerRepository] sumForUser error:", error);
      return ErrResult(toError(error));
    }
  }

  async reconcile(
    userId: UserId,
    at: Date,
  ): Promise<Result<ReconcileSnapshot | null, Error>> {
    try {
      const snapshot = await runInTransaction<ReconcileSnapshot | null>(
        async (session) => {
          const userCol = await UsersStore.collection();
          const raw = await userCol.findOne({ _id: userId }, { session });
          const user = raw ? UsersStore.parse(raw) : null;
          if (!user) return null;

          const ledgerTotal = await sumAmounts(userId, session);
          const rank = getRankForPoints(ledgerTotal);
          if (ledgerTotal !== user.totalPoints || rank !== user.rank) {
            await userCol.updateOne(
              { _id: userId },
              { $set: { totalPoints: ledgerTotal, rank, updatedAt: at } },
              { session },
            );
          }
          return {
            storedTotal: user.totalPoints,
            ledgerTotal,
            storedRank: user.rank,
            rank,
          };
        },
      );
      return OkResult(snapshot);
    } catch (error) {
      console.error("[LedgerRepository] reconcile error:", error);
      return ErrResult(toError(error));
    }
  }
}

export const ledgerRepository: LedgerRepository = new LedgerRepositoryImpl();
