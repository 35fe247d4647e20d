import { describe, expect, it } from "vitest";
import { computeNextStreak, sameStreak, visibleStreak } from "@/modules/engagement/users/streak";

const fresh = { lastLoginDay: null, current: 0, best: 0 };

describe("computeNextStreak", () => {
  it("starts at one", () => {
    expect(computeNextStreak(fresh, 100)).toEqual({ lastLoginDay: 100, current: 1, best: 1 });
  });

  it("extends on the following day", () => {
    expect(computeNextStreak({ lastLoginDay: 100, current: 3, best: 3 }, 101)).toEqual({
      lastLoginDay: 101,
      current: 4,
      best: 4,
    });
  });

  it("restarts after a gap and keeps the best run", () => {
    expect(computeNextStreak({ lastLoginDay: 100, current: 5, best: 9 }, 103)).toEqual({
      lastLoginDay: 103,
      current: 1,
      best: 9,
    });
  });

  it("leaves the streak alone for the same or an earlier day", () => {
    const streak = { lastLoginDay: 100, current: 2, best: 4 };
    expect(computeNextStreak(streak, 100)).toBe(streak);
    expect(computeNextStreak(streak, 98)).toBe(streak);
    expect(sameStreak(streak, computeNextStreak(streak, 99))).toBe(true);
  });
});

describe("visibleStreak", () => {
  const streak = { lastLoginDay: 100, current: 4, best: 6 };

  it("keeps the streak through the day after the last login", () => {
    expect(visibleStreak(streak, 100)).toBe(streak);
    expect(visibleStreak(streak, 101)).toBe(streak);
  });

  it("shows a lapsed streak as zero but keeps the best run", () => {
    expect(visibleStreak(streak, 102)).toEqual({ lastLoginDay: 100, current: 0, best: 6 });
  });

  it("leaves a user who never logged in alone", () => {
    expect(visibleStreak(fresh, 500)).toBe(fresh);
  });
});
