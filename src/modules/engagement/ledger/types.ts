import type { PointReason, PointTransactionDoc } from "@/db/schemas/ledger";
import type { RankName } from "@/db/schemas/user";
import type { UserId } from "@/db/types";

export type { PointReason };
export type PointTransaction = PointTransactionDoc;
/** A row before the store stamps the running balance on it. */
export type NewPointTransaction = Omit<PointTransaction, "balanceAfter">;

/** Result of a single append against the store. */
export type AppendOutcome =
  | {
      status: "applied";
      transaction: PointTransaction;
      balanceBefore: number;
      balanceAfter: number;
      rankBefore: RankName;
      rankAfter: RankName;
    }
  | { status: "duplicate"; transaction: PointTransaction }
  | { status: "missing_user" };

/**
 * What `record` reports back. `applied: false` is the idempotent replay path:
 * the returned transaction is the row written by the first call.
 */
export type RecordOutcome =
  | {
      applied: true;
      transaction: PointTransaction;
      balanceBefore: number;
      balanceAfter: number;
      rankBefore: RankName;
      rankAfter: RankName;
    }
  | { applied: false; transaction: PointTransaction };

export interface ReconcileSnapshot {
  readonly storedTotal: number;
  readonly ledgerTotal: number;
  readonly storedRank: RankName;
  readonly rank: RankName;
}

export interface ReconcileReport {
  readonly userId: UserId;
  readonly ledgerTotal: number;
  /** `ledgerTotal - storedTotal` before the rewrite; 0 when consistent. */
  readonly drift: number;
  readonly rank: RankName;
  readonly corrected: boolean;
}
