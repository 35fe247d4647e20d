import { describe, expect, it } from "vitest";
import {
  MEME_MILESTONES,
  milestonesReached,
  POINT_VALUES,
  resolveLedgerEntry,
} from "@/modules/engagement/ledger/policy";

const bonus = { min: 20, max: 100 };

describe("resolveLedgerEntry", () => {
  it("derives keys from the source record", () => {
    expect(
      resolveLedgerEntry({ reason: "meme_created", userId: "a", memeId: "m1" }, bonus).unwrap(),
    ).toEqual({
      userId: "a",
      reason: "meme_created",
      amount: 10,
      idempotencyKey: "meme:m1",
      note: null,
    });
    expect(
      resolveLedgerEntry({ reason: "like_received", userId: "a", likeId: "l1" }, bonus)
        .unwrap().idempotencyKey,
    ).toBe("like:l1");
    expect(
      resolveLedgerEntry({ reason: "like_removed_reversal", userId: "a", likeId: "l1" }, bonus)
        .unwrap().idempotencyKey,
    ).toBe("unlike:l1");
    expect(
      resolveLedgerEntry({ reason: "comment_made", userId: "c", commentId: "c9" }, bonus)
        .unwrap().idempotencyKey,
    ).toBe("comment:c9");
    expect(
      resolveLedgerEntry({ reason: "daily_login", userId: "a", day: "2026-03-02" }, bonus)
        .unwrap().idempotencyKey,
    ).toBe("login:a:2026-03-02");
  });

  it("uses the fixed amounts", () => {
    expect(POINT_VALUES).toEqual({
      meme_created: 10,
      like_received: 5,
      comment_made: 2,
      daily_login: 1,
      like_removed_reversal: -5,
    });
  });

  it("accepts a bonus within range and trims its note and key", () => {
    const entry = resolveLedgerEntry(
      { reason: "bonus", userId: "a", amount: 20, note: "  contest winner ", key: " march " },
      bonus,
    ).unwrap();
    expect(entry).toEqual({
      userId: "a",
      reason: "bonus",
      amount: 20,
      idempotencyKey: "bonus:march",
      note: "contest winner",
    });
  });

  it.each([19, 101, 25.5])("rejects a bonus of %s", (amount) => {
    const res = resolveLedgerEntry(
      { reason: "bonus", userId: "a", amount, note: "x", key: "k" },
      bonus,
    );
    expect(res.isErr()).toBe(true);
    if (res.isErr()) expect(res.error.code).toBe("INVALID_AMOUNT");
  });

  it("rejects a bonus without a note or key", () => {
    const noNote = resolveLedgerEntry(
      { reason: "bonus", userId: "a", amount: 50, note: "   ", key: "k" },
      bonus,
    );
    const noKey = resolveLedgerEntry(
      { reason: "bonus", userId: "a", amount: 50, note: "ok", key: "" },
      bonus,
    );
    expect(noNote.isErr() && noNote.error.message).toBe("Bonus requires a note");
    expect(noKey.isErr() && noKey.error.message).toBe("Bonus requires an idempotency key");
  });
});

describe("meme milestones", () => {
  const centuryClub = { memes: 100, points: 200, title: "Century club" };

  it("lists the milestones reached by a meme count", () => {
    expect(milestonesReached(4)).toEqual([]);
    expect(milestonesReached(5).map((milestone) => milestone.memes)).toEqual([5]);
    expect(milestonesReached(27).map((milestone) => milestone.memes)).toEqual([5, 10, 25]);
    expect(milestonesReached(500)).toEqual(MEME_MILESTONES);
  });

  it("records a milestone as a keyed bonus outside the manual range", () => {
    const entry = resolveLedgerEntry(
      { reason: "bonus", userId: "a", milestone: centuryClub },
      bonus,
    ).unwrap();
    expect(entry).toEqual({
      userId: "a",
      reason: "bonus",
      amount: 200,
      idempotencyKey: "milestone:a:100",
      note: "Milestone: Century club (100 memes)",
    });
  });
});
