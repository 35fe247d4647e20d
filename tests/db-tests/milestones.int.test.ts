/**
 * Meme milestone integration tests (in-process store).
 *
 * - Reaching a meme count credits its bonus once
 * - Replaying the creation that reached it credits nothing more
 * - The profile reports the level the bonus lands in
 */
import { describe, expect, it } from "vitest";
import { createTestEngine, ok, registerUsers } from "./_utils/engine";

const FIRST_FIVE = { memes: 5, points: 25, title: "First five memes" };

describe("meme milestones", () => {
  it("credits the five-meme bonus on the fifth meme", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice");

    const credited = [];
    for (const memeId of ["m1", "m2", "m3", "m4", "m5"]) {
      const outcome = ok(
        await engine.createMeme({ ownerId: "alice", contentRef: `${memeId}.png`, memeId }),
      );
      credited.push(outcome.milestones);
    }

    expect(credited).toEqual([[], [], [], [], [FIRST_FIVE]]);

    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(75);
    expect(profile.level).toEqual({
      level: 1,
      pointsInLevel: 75,
      pointsToNext: 25,
      progressPercent: 75,
    });

    const bonus = ok(await engine.history("alice")).find((row) => row.reason === "bonus");
    expect(bonus?.idempotencyKey).toBe("milestone:alice:5");
    expect(bonus?.amount).toBe(25);
    expect(bonus?.note).toBe("Milestone: First five memes (5 memes)");

    const entry = ok(await engine.listActivity("alice")).find(
      (activity) => activity.kind === "milestone_reached",
    );
    expect(entry && engine.describeActivity(entry)).toBe(
      "Reached the First five memes milestone (+25 points)",
    );
  });

  it("does not credit a milestone twice", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice");
    for (const memeId of ["m1", "m2", "m3", "m4", "m5"]) {
      ok(await engine.createMeme({ ownerId: "alice", contentRef: `${memeId}.png`, memeId }));
    }

    const replay = ok(await engine.createMeme({ ownerId: "alice", contentRef: "m5.png", memeId: "m5" }));
    const sixth = ok(await engine.createMeme({ ownerId: "alice", contentRef: "m6.png", memeId: "m6" }));

    expect(replay.milestones).toEqual([]);
    expect(sixth.milestones).toEqual([]);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(85);
    const bonuses = ok(await engine.history("alice")).filter((row) => row.reason === "bonus");
    expect(bonuses).toHaveLength(1);
  });
});
