/**
 * Purpose: run a unit of work inside a MongoDB multi-document transaction.
 * Context: repositories that must write several documents atomically (ledger
 * row + balance, like + counters) wrap their writes here.
 * Invariants: `work` must only write through the given session and must be
 * safe to re-run, since transient conflicts retry the whole unit; `attempts`
 * bounds the retries.
 * Gotchas: transactions need a replica set (a single-node `rs0` is enough).
 */
import type { ClientSession } from "mongodb";
import { hasErrorLabel } from "./helpers";
import { getMongoClient } from "./mongo";

const TRANSIENT_LABEL = "TransientTransactionError";
const UNKNOWN_COMMIT_LABEL = "UnknownTransactionCommitResult";
const DEFAULT_ATTEMPTS = 3;

async function commitWithRetry(
  session: ClientSession,
  attempts: number,
): Promise<void> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      await session.commitTransaction();
      return;
    } catch (error) {
      if (attempt < attempts && hasErrorLabel(error, UNKNOWN_COMMIT_LABEL)) {
        continue;
      }
      throw error;
    }
  }
}

/**
 * Execute `work` in a transaction and return its value.
 *
 * Errors thrown by `work` abort the transaction and propagate unchanged, so
 * callers can still recognise a duplicate-key error from a unique index.
 */
export async function runInTransaction<T>(
  work: (session: ClientSession) => Promise<T>,
  attempts = DEFAULT_ATTEMPTS,
): Promise<T> {
  const client = await getMongoClient();
  const session = client.startSession();

  try {
    for (let attempt = 1; ; attempt += 1) {
      session.startTransaction({
        readConcern: { level: "snapshot" },
        writeConcern: { w: "majority" },
      });

      try {
        const value = await work(session);
        await commitWithRetry(session, attempts);
        return value;
      } catch (error) {
        if (session.inTransaction()) {
          await session.abortTransaction();
        }
        if (attempt < attempts && hasErrorLabel(error, TRANSIENT_LABEL)) {
          continue;
        }
        throw error;
      }
    }
  } finally {
    await session.endSession();
  }
}
