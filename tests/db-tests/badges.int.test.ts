/**
 * Badge evaluator integration tests (in-process store).
 */
import { describe, expect, it } from "vitest";
import { resolveEngagementConfig } from "../../src/configuration";
import {
  BadgeCatalog,
  createEngagementEngine,
  createMemoryRepositories,
  parseBadgeCatalog,
} from "../../src/modules/engagement";
import { createTestClock, createTestEngine, err, ok, registerUsers } from "./_utils/engine";

describe("badge evaluation", () => {
  it("awards first_steps once across several memes", async () => {
    const { engine, db } = createTestEngine();
    await registerUsers(engine, "alice");

    const first = ok(await engine.createMeme({ ownerId: "alice", contentRef: "a.png" }));
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "b.png" }));
    const evaluated = ok(await engine.evaluateBadges("alice"));

    expect(first.meme.ownerId).toBe("alice");
    expect(evaluated).toEqual([]);
    const awards = [...db.awards.values()].filter((award) => award.badgeId === "first_steps");
    expect(awards).toHaveLength(1);
    expect(awards[0]?._id).toBe("alice:first_steps");
  });

  it("awards a badge once under concurrent evaluations", async () => {
    const { engine, db } = createTestEngine();
    await registerUsers(engine, "alice");
    const stored = db.users.get("alice");
    if (stored) stored.stats.memesCreated = 5;

    const results = await Promise.all(
      Array.from({ length: 4 }, () => engine.evaluateBadges("alice", ["memesCreated"])),
    );

    const granted = results.flatMap((res) => ok(res).map((entry) => entry.badge.id)).sort();
    expect(granted).toEqual(["first_steps", "getting_started"]);
    expect(db.awards.size).toBe(2);
    const badgeLogs = [...db.activities.values()].filter((entry) => entry.kind === "badge_awarded");
    expect(badgeLogs).toHaveLength(2);
  });

  it("emits one event per new award", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice");
    const seen: string[] = [];
    engine.hooks.badgeAwarded.on((award, badge) => {
      seen.push(`${award.userId}:${badge.id}`);
    });

    ok(await engine.createMeme({ ownerId: "alice", contentRef: "a.png" }));
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "b.png" }));

    expect(seen).toEqual(["alice:first_steps"]);
  });

  it("keeps earned badges when the statistic drops", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice", "bob");
    ok(await engine.createMeme({ ownerId: "alice", contentRef: "a.png", memeId: "m1" }));
    ok(await engine.addLike("bob", "m1"));
    ok(await engine.removeLike("bob", "m1"));

    const held = ok(await engine.getProfile("alice")).badges.map((badge) => badge.badgeId);
    expect(held).toEqual(["first_fan", "first_steps"]);
  });

  it("builds the badge board with progress and category counts", async () => {
    const { engine } = createTestEngine();
    await registerUsers(engine, "alice");
    for (const ref of ["a.png", "b.png", "c.png"]) {
      ok(await engine.createMeme({ ownerId: "alice", contentRef: ref }));
    }

    const board = ok(await engine.getBadgeBoard("alice"));

    expect(board.totalCount).toBe(19);
    expect(board.heldCount).toBe(1);
    expect(board.byCategory.creator).toEqual({ held: 1, total: 5 });
    expect(board.byCategory.social).toEqual({ held: 0, total: 8 });
    const gettingStarted = board.entries.find((entry) => entry.badge.id === "getting_started");
    expect(gettingStarted?.held).toBe(false);
    expect(gettingStarted?.progress).toEqual({ current: 3, target: 5, percent: 60 });
    const firstSteps = board.entries.find((entry) => entry.badge.id === "first_steps");
    expect(firstSteps?.awardedAt).toEqual(new Date("2026-03-02T12:00:00.000Z"));

    expect(err(await engine.getBadgeBoard("ghost")).code).toBe("USER_NOT_FOUND");
  });

  it("evaluates against a custom catalog", async () => {
    const catalog = new BadgeCatalog(
      parseBadgeCatalog([
        {
          id: "chatty",
          name: "Chatty",
          description: "Write two comments",
          emoji: "🗨️",
          category: "social",
          criteria: { type: "threshold", stat: "commentsMade", min: 2 },
        },
      ]),
    );
    const custom = createEngagementEngine({
      config: resolveEngagementConfig(),
      repositories: createMemoryRepositories(),
      catalog,
      clock: createTestClock().clock,
    });
    await registerUsers(custom, "alice");
    ok(await custom.createMeme({ ownerId: "alice", contentRef: "a.png", memeId: "m1" }));
    ok(await custom.addComment("alice", "m1", "one"));
    expect(ok(await custom.getProfile("alice")).badges).toEqual([]);
    ok(await custom.addComment("alice", "m1", "two"));

    expect(ok(await custom.getProfile("alice")).badges.map((badge) => badge.badgeId)).toEqual([
      "chatty",
    ]);
  });
});
