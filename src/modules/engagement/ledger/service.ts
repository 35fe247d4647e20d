/**
 * Ledger Service (points accountant).
 *
 * Purpose: turn a `LedgerEvent` into exactly one point transaction and keep
 * the user's balance and rank derived from it.
 *
 * Flow per `record`:
 * 1. Resolve amount and idempotency key from the event (policy.ts).
 * 2. Append atomically (row + balance + rank) or resolve to the existing row.
 * 3. On a rank change, log `rank_changed`; then evaluate rank and point badges.
 * 4. Publish `pointsRecorded` / `rankChanged` after the commit.
 *
 * Step 3 is keyed by the transaction id and also runs on a replay, using the
 * running balance stored on the row, so a retry after a failed step 3
 * finishes it. Step 4 only runs for the call that applied the row.
 */
import type { RankName } from "@/db/schemas/user";
import type { UserId } from "@/db/types";
import type { EngagementHooks } from "@/events/hooks/engagement";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ActivityService } from "../activity/service";
import { activityKeys } from "../activity/types";
import type { BadgeService } from "../badges/service";
import { EngagementError, storeUnavailable } from "../errors";
import { newId, type PageOptions } from "../ids";
import { resolveLedgerEntry, type BonusRange, type LedgerEvent } from "./policy";
import { getRankForPoints, rankIndex } from "./ranks";
import type { LedgerRepository } from "./repository";
import type {
  NewPointTransaction,
  PointTransaction,
  ReconcileReport,
  RecordOutcome,
} from "./types";

export interface LedgerServiceDeps {
  readonly ledger: LedgerRepository;
  readonly activity: ActivityService;
  readonly badges: BadgeService;
  readonly hooks: EngagementHooks;
  readonly bonus: BonusRange;
  readonly clock: () => Date;
}

export class LedgerService {
  constructor(private readonly deps: LedgerServiceDeps) {}

  async record(event: LedgerEvent): Promise<Result<RecordOutcome, EngagementError>> {
    const entryRes = resolveLedgerEntry(event, this.deps.bonus);
    if (entryRes.isErr()) return ErrResult(entryRes.error);

    const transaction: NewPointTransaction = {
      _id: newId(),
      ...entryRes.unwrap(),
      createdAt: this.deps.clock(),
    };

    const appendRes = await this.deps.ledger.append(transaction);
    if (appendRes.isErr()) {
      return ErrResult(storeUnavailable("Ledger.record", appendRes.error));
    }

    const outcome = appendRes.unwrap();
    if (outcome.status === "missing_user") {
      return ErrResult(
        new EngagementError("USER_NOT_FOUND", `Unknown user ${transaction.userId}`),
      );
    }

    if (outcome.status === "duplicate") {
      const stored = outcome.transaction;
      const settled = await this.settle(
        stored,
        getRankForPoints(stored.balanceAfter - stored.amount),
        getRankForPoints(stored.balanceAfter),
      );
      if (settled.isErr()) return ErrResult(settled.error);
      return OkResult({ applied: false, transaction: stored });
    }

    const { rankBefore, rankAfter, balanceAfter } = outcome;
    const settled = await this.settle(outcome.transaction, rankBefore, rankAfter);
    if (settled.isErr()) return ErrResult(settled.error);

    void this.deps.hooks.pointsRecorded.emit(outcome.transaction, balanceAfter);
    if (rankBefore !== rankAfter) {
      void this.deps.hooks.rankChanged.emit(transaction.userId, rankBefore, rankAfter);
    }

    return OkResult({
      applied: true,
      transaction: outcome.transaction,
      balanceBefore: outcome.balanceBefore,
      balanceAfter,
      rankBefore,
      rankAfter,
    });
  }

  private async settle(
    transaction: PointTransaction,
    rankBefore: RankName,
    rankAfter: RankName,
  ): Promise<Result<void, EngagementError>> {
    if (rankBefore !== rankAfter) {
      const logged = await this.deps.activity.append({
        userId: transaction.userId,
        kind: "rank_changed",
        reference: transaction._id,
        metadata: {
          from: rankBefore,
          to: rankAfter,
          direction: rankIndex(rankAfter) > rankIndex(rankBefore) ? "up" : "down",
        },
        key: activityKeys.rankChanged(transaction._id),
      });
      if (logged.isErr()) return ErrResult(logged.error);
    }

    const evaluated = await this.deps.badges.evaluate(transaction.userId, [
      "rank",
      "totalPoints",
    ]);
    if (evaluated.isErr()) return ErrResult(evaluated.error);
    return OkResult(undefined);
  }

  /** Audited manual award; amount bounded by configuration, note required. */
  async awardBonus(input: {
    userId: UserId;
    amount: number;
    note: string;
    idempotencyKey: string;
  }): Promise<Result<RecordOutcome, EngagementError>> {
    const recorded = await this.record({
      reason: "bonus",
      userId: input.userId,
      amount: input.amount,
      note: input.note,
      key: input.idempotencyKey,
    });
    if (recorded.isErr()) return ErrResult(recorded.error);

    const { transaction } = recorded.unwrap();
    const logged = await this.deps.activity.append({
      userId: transaction.userId,
      kind: "bonus_awarded",
      reference: transaction._id,
      metadata: { amount: transaction.amount, note: transaction.note },
      key: activityKeys.bonusAwarded(transaction._id),
    });
    if (logged.isErr()) return ErrResult(logged.error);
    return recorded;
  }

  async history(
    userId: UserId,
    page: PageOptions = {},
  ): Promise<Result<PointTransaction[], EngagementError>> {
    const res = await this.deps.ledger.listForUser(userId, page);
    if (res.isErr()) return ErrResult(storeUnavailable("Ledger.history", res.error));
    return OkResult(res.unwrap());
  }

  async ledgerTotal(userId: UserId): Promise<Result<number, EngagementError>> {
    const res = await this.deps.ledger.sumForUser(userId);
    if (res.isErr()) return ErrResult(storeUnavailable("Ledger.ledgerTotal", res.error));
    return OkResult(res.unwrap());
  }

  /** Rewrite the stored total and rank from the ledger sum; reports the drift. */
  async reconcile(userId: UserId): Promise<Result<ReconcileReport, EngagementError>> {
    const res = await this.deps.ledger.reconcile(userId, this.deps.clock());
    if (res.isErr()) return ErrResult(storeUnavailable("Ledger.reconcile", res.error));

    const snapshot = res.unwrap();
    if (!snapshot) {
      return ErrResult(new EngagementError("USER_NOT_FOUND", `Unknown user ${userId}`));
    }

    const drift = snapshot.ledgerTotal - snapshot.storedTotal;
    const corrected = drift !== 0 || snapshot.rank !== snapshot.storedRank;
    if (corrected) {
      console.warn("[Ledger] reconcile corrected stored balance", {
        userId,
        storedTotal: snapshot.storedTotal,
        ledgerTotal: snapshot.ledgerTotal,
      });
    }
    return OkResult({
      userId,
      ledgerTotal: snapshot.ledgerTotal,
      drift,
      rank: snapshot.rank,
      corrected,
    });
  }
}
