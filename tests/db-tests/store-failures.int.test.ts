/**
 * Store failure integration tests.
 *
 * A repository that fails on demand stands in for a dropped connection. The
 * failed operation reports StoreUnavailable; retrying it with the same ids
 * completes the missing steps without double-crediting.
 */
import { describe, expect, it } from "vitest";
import { MemoryDatabase } from "../../src/db/memory";
import {
  createMemoryRepositories,
  MemoryActivityRepository,
  MemoryLedgerRepository,
  MemoryUsersRepository,
  type Activity,
  type ActivityKind,
  type AppendOutcome,
  type EngagementUser,
  type NewPointTransaction,
  type PointReason,
} from "../../src/modules/engagement";
import { ErrResult, type Result } from "../../src/utils/result";
import { createTestEngine, err, ok, registerUsers } from "./_utils/engine";

class FlakyLedgerRepository extends MemoryLedgerRepository {
  failures = 0;
  /** When set, only appends with this reason fail. */
  failReason: PointReason | null = null;

  override async append(
    transaction: NewPointTransaction,
  ): Promise<Result<AppendOutcome, Error>> {
    const targeted = this.failReason === null || this.failReason === transaction.reason;
    if (this.failures > 0 && targeted) {
      this.failures -= 1;
      return ErrResult(new Error("connection reset"));
    }
    return super.append(transaction);
  }
}

class FlakyActivityRepository extends MemoryActivityRepository {
  failKind: ActivityKind | null = null;

  override async append(activity: Activity): Promise<Result<Activity, Error>> {
    if (this.failKind === activity.kind) {
      this.failKind = null;
      return ErrResult(new Error("connection reset"));
    }
    return super.append(activity);
  }
}

function flakyEngine() {
  const db = new MemoryDatabase();
  const ledger = new FlakyLedgerRepository(db);
  const activity = new FlakyActivityRepository(db);
  const harness = createTestEngine({
    db,
    repositories: { ...createMemoryRepositories(db), ledger, activity },
  });
  return { ...harness, ledger, activity };
}

describe("store failures", () => {
  it("reports a retryable error and heals a meme on retry", async () => {
    const { engine, ledger } = flakyEngine();
    await registerUsers(engine, "alice");

    ledger.failures = 1;
    const error = err(
      await engine.createMeme({ ownerId: "alice", contentRef: "m1.png", memeId: "m1" }),
    );
    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(error.retryable).toBe(true);
    expect(error.message).toBe("Ledger.record: store unavailable");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(0);

    const retried = ok(
      await engine.createMeme({ ownerId: "alice", contentRef: "m1.png", memeId: "m1" }),
    );
    expect(retried.created).toBe(false);
    expect(retried.points.applied).toBe(true);
    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(10);
    expect(profile.stats.memesCreated).toBe(1);
    expect(profile.badges.map((badge) => badge.badgeId)).toEqual(["first_steps"]);
  });

  it("credits a stored like when the like is retried", async () => {
    const { engine, ledger, db } = flakyEngine();
    await registerUsers(engine, "alice", "bob");
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "m1.png", memeId: "m1" }));

    ledger.failures = 1;
    expect(err(await engine.addLike("bob", "m1")).kind).toBe("StoreUnavailable");
    expect(db.likes.size).toBe(1);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(10);

    expect(err(await engine.addLike("bob", "m1")).code).toBe("ALREADY_LIKED");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(15);
    expect(ok(await engine.ledger.ledgerTotal("alice"))).toBe(15);
  });

  it("keeps the like when its reversal cannot be written", async () => {
    const { engine, ledger, db } = flakyEngine();
    await registerUsers(engine, "alice", "bob");
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "m1.png", memeId: "m1" }));
    ok(await engine.addLike("bob", "m1"));

    ledger.failures = 1;
    ledger.failReason = "like_removed_reversal";
    expect(err(await engine.removeLike("bob", "m1")).code).toBe("STORE_UNAVAILABLE");
    expect(db.likes.size).toBe(1);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(15);

    ok(await engine.removeLike("bob", "m1"));
    expect(db.likes.size).toBe(0);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(10);
  });

  it("credits a like whose points never landed before reversing it", async () => {
    const { engine, ledger, db } = flakyEngine();
    await registerUsers(engine, "alice", "bob");
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "m1.png", memeId: "m1" }));

    ledger.failures = 1;
    expect(err(await engine.addLike("bob", "m1")).code).toBe("STORE_UNAVAILABLE");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(10);

    ok(await engine.removeLike("bob", "m1"));

    expect(db.likes.size).toBe(0);
    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(10);
    expect(profile.stats.likesReceived).toBe(0);
    expect(ok(await engine.ledger.ledgerTotal("alice"))).toBe(10);
    const reasons = ok(await engine.history("alice")).map((row) => row.reason).sort();
    expect(reasons).toEqual(["like_received", "like_removed_reversal", "meme_created"]);
  });

  it("finishes a rank change on retry after its activity failed", async () => {
    const { engine, activity } = flakyEngine();
    await registerUsers(engine, "alice");

    activity.failKind = "rank_changed";
    const error = err(await engine.awardBonus("alice", 50, "Launch contest", "launch-1"));
    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(50);

    const retried = ok(await engine.awardBonus("alice", 50, "Launch contest", "launch-1"));
    expect(retried.applied).toBe(false);

    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(50);
    expect(profile.rank).toBe("Rookie Memer");
    expect(profile.badges.map((badge) => badge.badgeId)).toEqual(["rookie_memer"]);
    const kinds = ok(await engine.listActivity("alice")).map((entry) => entry.kind).sort();
    expect(kinds).toEqual(["badge_awarded", "bonus_awarded", "rank_changed"]);
    expect(ok(await engine.history("alice"))).toHaveLength(1);
  });

  it("credits a milestone on the retry after its bonus failed", async () => {
    const { engine, ledger } = flakyEngine();
    await registerUsers(engine, "alice");
    for (const memeId of ["m1", "m2", "m3", "m4"]) {
      ok(await engine.createMeme({ ownerId: "alice", contentRef: `${memeId}.png`, memeId }));
    }

    ledger.failures = 1;
    ledger.failReason = "bonus";
    const error = err(
      await engine.createMeme({ ownerId: "alice", contentRef: "m5.png", memeId: "m5" }),
    );
    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(50);

    const retried = ok(
      await engine.createMeme({ ownerId: "alice", contentRef: "m5.png", memeId: "m5" }),
    );
    expect(retried.created).toBe(false);
    expect(retried.milestones.map((milestone) => milestone.memes)).toEqual([5]);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(75);
  });

  it("wraps read failures with their cause", async () => {
    const cause = new Error("socket timeout");
    class BrokenUsersRepository extends MemoryUsersRepository {
      override async get(): Promise<Result<EngagementUser | null, Error>> {
        return ErrResult(cause);
      }
    }
    const db = new MemoryDatabase();
    const { engine } = createTestEngine({
      db,
      repositories: { ...createMemoryRepositories(db), users: new BrokenUsersRepository(db) },
    });

    const error = err(await engine.getProfile("alice"));
    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(error.cause).toBe(cause);
  });
});
