/**
 * Daily login integration tests (in-process store).
 *
 * - Second login on the same UTC day credits nothing
 * - Consecutive days build the streak; a gap restarts it
 * - Streak badges follow the streak
 */
import { describe, expect, it } from "vitest";
import { createTestEngine, err, ok, registerUsers } from "./_utils/engine";

const DAY = 24 * 60 * 60 * 1000;

describe("daily login", () => {
  it("credits one point per calendar day", async () => {
    const { engine, set } = createTestEngine();
    await registerUsers(engine, "alice");

    const first = ok(await engine.recordLogin("alice"));
    set("2026-03-02T23:59:00.000Z");
    const second = ok(await engine.recordLogin("alice"));

    expect(first.credited).toBe(true);
    expect(first.day).toBe("2026-03-02");
    expect(second.credited).toBe(false);
    expect(second.transaction._id).toBe(first.transaction._id);
    expect(second.streak).toEqual(first.streak);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(1);
  });

  it("builds a streak over consecutive days and awards early_bird", async () => {
    const { engine, advance } = createTestEngine();
    await registerUsers(engine, "alice");

    const outcomes = [];
    for (let day = 0; day < 7; day += 1) {
      outcomes.push(ok(await engine.recordLogin("alice")));
      advance(DAY);
    }

    expect(outcomes.map((outcome) => outcome.streak.current)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(outcomes[5]?.badges).toEqual([]);
    expect(outcomes[6]?.badges.map((entry) => entry.badge.id)).toEqual(["early_bird"]);

    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(7);
    expect(profile.streak).toMatchObject({ current: 7, best: 7 });

    const latest = ok(await engine.listActivity("alice")).find(
      (entry) => entry.kind === "daily_login",
    );
    expect(latest && engine.describeActivity(latest)).toBe("Logged in (7-day streak)");
  });

  it("restarts the streak after a missed day", async () => {
    const { engine, advance } = createTestEngine();
    await registerUsers(engine, "alice");

    ok(await engine.recordLogin("alice"));
    advance(DAY);
    ok(await engine.recordLogin("alice"));
    advance(3 * DAY);
    const afterGap = ok(await engine.recordLogin("alice"));

    expect(afterGap.streak).toMatchObject({ current: 1, best: 2 });
    expect(afterGap.credited).toBe(true);
  });

  it("shows a lapsed streak as zero on the profile", async () => {
    const { engine, advance } = createTestEngine();
    await registerUsers(engine, "alice");

    ok(await engine.recordLogin("alice"));
    advance(DAY);
    ok(await engine.recordLogin("alice"));
    advance(DAY);
    expect(ok(await engine.getProfile("alice")).streak.current).toBe(2);

    advance(DAY);
    const streak = ok(await engine.getProfile("alice")).streak;
    expect(streak.current).toBe(0);
    expect(streak.best).toBe(2);
  });

  it("counts an explicit login instant", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice");

    const outcome = ok(await engine.recordLogin("alice", new Date("2026-02-27T08:00:00Z")));
    expect(outcome.day).toBe("2026-02-27");
    expect(outcome.transaction.idempotencyKey).toBe("login:alice:2026-02-27");
  });

  it("rejects unknown users", async () => {
    const { engine } = createTestEngine();
    expect(err(await engine.recordLogin("ghost")).code).toBe("USER_NOT_FOUND");
  });
});
