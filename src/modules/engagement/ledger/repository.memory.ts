import { deepClone } from "@/db/helpers";
import { compareNewestFirst, type MemoryDatabase } from "@/db/memory";
import type { UserId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import { clampPageSize, type PageOptions } from "../ids";
import { getRankForPoints } from "./ranks";
import type { LedgerRepository } from "./repository";
import type {
  AppendOutcome,
  NewPointTransaction,
  PointTransaction,
  ReconcileSnapshot,
} from "./types";

export class MemoryLedgerRepository implements LedgerRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async append(transaction: NewPointTransaction): Promise<Result<AppendOutcome, Error>> {
    const existingId = this.db.transactionByKey.get(transaction.idempotencyKey);
    const existing = existingId ? this.db.transactions.get(existingId) : undefined;
    if (existing) {
      return OkResult({ status: "duplicate", transaction: deepClone(existing) });
    }

    const user = this.db.users.get(transaction.userId);
    if (!user) return OkResult({ status: "missing_user" });

    const balanceBefore = user.totalPoints;
    const rankBefore = user.rank;
    const balanceAfter = balanceBefore + transaction.amount;
    const rankAfter = getRankForPoints(balanceAfter);

    const row: PointTransaction = { ...transaction, balanceAfter };
    this.db.transactions.set(row._id, deepClone(row));
    this.db.transactionByKey.set(row.idempotencyKey, row._id);
    user.totalPoints = balanceAfter;
    user.rank = rankAfter;
    user.updatedAt = transaction.createdAt;

    return OkResult({
      status: "applied",
      transaction: deepClone(row),
      balanceBefore,
      balanceAfter,
      rankBefore,
      rankAfter,
    });
  }

  async findByKey(
    idempotencyKey: string,
  ): Promise<Result<PointTransaction | null, Error>> {
    const id = this.db.transactionByKey.get(idempotencyKey);
    const row = id ? this.db.transactions.get(id) : undefined;
    return OkResult(row ? deepClone(row) : null);
  }

  async listForUser(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<PointTransaction[], Error>> {
    const before = page.before?.getTime();
    const rows = [...this.db.transactions.values()]
      .filter(
        (row) =>
          row.userId === userId &&
          (before === undefined || row.createdAt.getTime() < before),
      )
      .sort(compareNewestFirst)
      .slice(0, clampPageSize(page.limit));
    return OkResult(rows.map(deepClone));
  }

  async sumForUser(userId: UserId): Promise<Result<number, Error>> {
    return OkResult(this.sum(userId));
  }

  async reconcile(
    userId: UserId,
    at: Date,
  ): Promise<Result<ReconcileSnapshot | null, Error>> {
    const user = this.db.users.get(userId);
    if (!user) return OkResult(null);

    const ledgerTotal = this.sum(userId);
    const rank = getRankForPoints(ledgerTotal);
    const snapshot: ReconcileSnapshot = {
      storedTotal: user.totalPoints,
      ledgerTotal,
      storedRank: user.rank,
      rank,
    };
    if (ledgerTotal !== user.totalPoints || rank !== user.rank) {
      user.totalPoints = ledgerTotal;
      user.rank = rank;
      user.updatedAt = at;
    }
    return OkResult(snapshot);
  }

  private sum(userId: UserId): number {
    let total = 0;
    for (const row of this.db.transactions.values()) {
      if (row.userId === userId) total += row.amount;
    }
    return total;
  }
}
