import { describe, expect, it } from "vitest";
import { compareAndSwap } from "@/db/compare-and-swap";
import type { LoginStreak } from "@/db/schemas/user";
import { computeNextStreak, sameStreak } from "@/modules/engagement/users/streak";
import { ErrResult, OkResult } from "@/utils/result";

/**
 * One stored streak. Each entry of `racing` is written by another login just
 * before the matching write lands.
 */
function streakCell(initial: LoginStreak | null, racing: LoginStreak[] = []) {
  let stored = initial;
  let writes = 0;
  return {
    get stored() {
      return stored;
    },
    get writes() {
      return writes;
    },
    read: async () => OkResult<LoginStreak | null, Error>(stored ? { ...stored } : null),
    write: async (expected: LoginStreak, next: LoginStreak) => {
      writes += 1;
      const other = racing.shift();
      if (other) stored = other;
      if (!stored || !sameStreak(stored, expected)) return OkResult<boolean, Error>(false);
      stored = next;
      return OkResult<boolean, Error>(true);
    },
  };
}

const swapLogin = (cell: ReturnType<typeof streakCell>, dayStamp: number, attempts = 3) =>
  compareAndSwap<LoginStreak>({
    label: "Streak update for u1",
    attempts,
    read: cell.read,
    next: (streak) => computeNextStreak(streak, dayStamp),
    equals: sameStreak,
    write: cell.write,
  });

describe("compareAndSwap", () => {
  it("writes the next value when nothing races", async () => {
    const cell = streakCell({ lastLoginDay: 9, current: 2, best: 4 });
    const res = await swapLogin(cell, 10);
    expect(res.unwrap()).toEqual({
      before: { lastLoginDay: 9, current: 2, best: 4 },
      after: { lastLoginDay: 10, current: 3, best: 4 },
      changed: true,
    });
    expect(cell.writes).toBe(1);
  });

  it("skips the write when the value would not change", async () => {
    const cell = streakCell({ lastLoginDay: 10, current: 3, best: 4 });
    const res = await swapLogin(cell, 10);
    expect(res.unwrap()).toEqual({
      before: { lastLoginDay: 10, current: 3, best: 4 },
      after: { lastLoginDay: 10, current: 3, best: 4 },
      changed: false,
    });
    expect(cell.writes).toBe(0);
  });

  it("resolves to null for a missing document", async () => {
    const cell = streakCell(null);
    const res = await swapLogin(cell, 10);
    expect(res.unwrap()).toBeNull();
    expect(cell.writes).toBe(0);
  });

  it("recomputes from a fresh read after losing a race", async () => {
    const cell = streakCell({ lastLoginDay: 8, current: 1, best: 1 }, [
      { lastLoginDay: 9, current: 2, best: 2 },
    ]);
    const res = await swapLogin(cell, 10);
    expect(res.unwrap()).toEqual({
      before: { lastLoginDay: 9, current: 2, best: 2 },
      after: { lastLoginDay: 10, current: 3, best: 3 },
      changed: true,
    });
    expect(cell.writes).toBe(2);
    expect(cell.stored).toEqual({ lastLoginDay: 10, current: 3, best: 3 });
  });

  it("stops without writing when the winning race already recorded the day", async () => {
    const cell = streakCell({ lastLoginDay: 9, current: 2, best: 2 }, [
      { lastLoginDay: 10, current: 3, best: 3 },
    ]);
    const res = await swapLogin(cell, 10);
    expect(res.unwrap()).toMatchObject({ changed: false });
    expect(cell.writes).toBe(1);
  });

  it("fails once every attempt loses", async () => {
    const cell = streakCell({ lastLoginDay: 1, current: 1, best: 1 }, [
      { lastLoginDay: 2, current: 2, best: 2 },
      { lastLoginDay: 3, current: 3, best: 3 },
    ]);
    const res = await swapLogin(cell, 10, 2);
    expect(res.isErr() && res.error.message).toBe(
      "Streak update for u1 kept conflicting after 2 attempts",
    );
  });

  it("passes read errors through without writing", async () => {
    const res = await compareAndSwap<LoginStreak>({
      label: "Streak update for u1",
      attempts: 3,
      read: async () => ErrResult(new Error("read failed")),
      next: (streak) => streak,
      equals: sameStreak,
      write: async () => OkResult(true),
    });
    expect(res.isErr() && res.error.message).toBe("read failed");
  });

  it("rejects a non-positive attempt count", async () => {
    const cell = streakCell({ lastLoginDay: 1, current: 1, best: 1 });
    const res = await swapLogin(cell, 10, 0);
    expect(res.isErr() && res.error.message).toBe(
      "Streak update for u1: attempts must be at least 1",
    );
  });
});
