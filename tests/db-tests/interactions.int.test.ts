/**
 * Interaction guard integration tests (in-process store).
 *
 * - One like per user and meme, including under concurrent requests
 * - Reversal on unlike, self-like policy, reference checks
 * - Comment validation, threading and replay
 */
import { describe, expect, it } from "vitest";
import { createTestEngine, err, ok, registerUsers } from "./_utils/engine";

async function withMeme(options: Parameters<typeof createTestEngine>[0] = {}) {
  const harness = createTestEngine(options);
  await registerUsers(harness.engine, "alice", "bob", "carol");
  ok(
    await harness.engine.createMeme({
      ownerId: "alice",
      contentRef: "renders/m1.png",
      memeId: "m1",
    }),
  );
  return harness;
}

describe("likes", () => {
  it("credits the meme owner and counts the like", async () => {
    const { engine, db } = await withMeme();

    const like = ok(await engine.addLike("bob", "m1"));

    expect(like.userId).toBe("bob");
    expect(db.memes.get("m1")?.likeCount).toBe(1);
    const owner = ok(await engine.getProfile("alice"));
    expect(owner.totalPoints).toBe(15);
    expect(owner.stats.likesReceived).toBe(1);
    expect(ok(await engine.getProfile("bob")).totalPoints).toBe(0);

    const feed = ok(await engine.listActivity("bob"));
    expect(feed.map((entry) => entry.kind)).toEqual(["like_added"]);
    expect(feed[0]?.metadata).toEqual({ memeId: "m1", ownerId: "alice" });
  });

  it("rejects a second like from the same user", async () => {
    const { engine } = await withMeme();
    ok(await engine.addLike("bob", "m1"));

    const error = err(await engine.addLike("bob", "m1"));

    expect(error.code).toBe("ALREADY_LIKED");
    expect(error.kind).toBe("DuplicateAction");
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(15);
  });

  it("admits exactly one of several concurrent likes", async () => {
    const { engine, db } = await withMeme();

    const results = await Promise.all([
      engine.addLike("bob", "m1"),
      engine.addLike("bob", "m1"),
      engine.addLike("bob", "m1"),
    ]);

    expect(results.filter((res) => res.isOk())).toHaveLength(1);
    const rejected = results.filter((res) => res.isErr()).map((res) => err(res).code);
    expect(rejected).toEqual(["ALREADY_LIKED", "ALREADY_LIKED"]);
    expect(db.likes.size).toBe(1);
    expect(db.memes.get("m1")?.likeCount).toBe(1);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(15);
    expect(ok(await engine.ledger.ledgerTotal("alice"))).toBe(15);
  });

  it("blocks self-likes unless allowed", async () => {
    const strict = await withMeme();
    const error = err(await strict.engine.addLike("alice", "m1"));
    expect(error.code).toBe("SELF_LIKE");
    expect(error.kind).toBe("PolicyViolation");

    const lenient = await withMeme({ config: { allowSelfLike: true } });
    ok(await lenient.engine.addLike("alice", "m1"));
    expect(ok(await lenient.engine.getProfile("alice")).totalPoints).toBe(15);
  });

  it("checks the meme and the user exist", async () => {
    const { engine } = await withMeme();
    expect(err(await engine.addLike("bob", "missing")).code).toBe("MEME_NOT_FOUND");
    expect(err(await engine.addLike("ghost", "m1")).code).toBe("USER_NOT_FOUND");
    expect(err(await engine.addLike("bad id", "m1")).code).toBe("INVALID_INPUT");
  });

  it("reverses the credit when a like is removed", async () => {
    const { engine, db } = await withMeme();
    ok(await engine.addLike("bob", "m1"));

    ok(await engine.removeLike("bob", "m1"));

    expect(db.memes.get("m1")?.likeCount).toBe(0);
    const owner = ok(await engine.getProfile("alice"));
    expect(owner.totalPoints).toBe(10);
    expect(owner.stats.likesReceived).toBe(0);
    const reasons = ok(await engine.history("alice")).map((row) => row.reason).sort();
    expect(reasons).toEqual(["like_received", "like_removed_reversal", "meme_created"]);

    expect(err(await engine.removeLike("bob", "m1")).code).toBe("NOT_LIKED");
  });

  it("credits a fresh like after an unlike", async () => {
    const { engine } = await withMeme();
    const first = ok(await engine.addLike("bob", "m1"));
    ok(await engine.removeLike("bob", "m1"));
    const second = ok(await engine.addLike("bob", "m1"));

    expect(second._id).not.toBe(first._id);
    expect(ok(await engine.getProfile("alice")).totalPoints).toBe(15);
  });

  it("publishes like events with the updated count", async () => {
    const { engine } = await withMeme();
    const counts: number[] = [];
    engine.hooks.likeAdded.on((_like, meme) => {
      counts.push(meme.likeCount);
    });
    engine.hooks.likeRemoved.on((_like, meme) => {
      counts.push(meme.likeCount);
    });

    ok(await engine.addLike("bob", "m1"));
    ok(await engine.addLike("carol", "m1"));
    ok(await engine.removeLike("bob", "m1"));

    expect(counts).toEqual([1, 2, 1]);
  });
});

describe("comments", () => {
  it("stores a trimmed comment and credits its author", async () => {
    const { engine, db } = await withMeme();

    const comment = ok(await engine.addComment("carol", "m1", "  nice one  "));

    expect(comment.body).toBe("nice one");
    expect(comment.parentId).toBeNull();
    expect(db.memes.get("m1")?.commentCount).toBe(1);
    const author = ok(await engine.getProfile("carol"));
    expect(author.totalPoints).toBe(2);
    expect(author.stats.commentsMade).toBe(1);
  });

  it("rejects empty and oversized bodies", async () => {
    const { engine } = await withMeme({ config: { maxCommentLength: 10 } });
    expect(err(await engine.addComment("carol", "m1", "   ")).code).toBe("EMPTY_BODY");
    expect(err(await engine.addComment("carol", "m1", "x".repeat(11))).code).toBe(
      "BODY_TOO_LONG",
    );
    ok(await engine.addComment("carol", "m1", "x".repeat(10)));
  });

  it("requires the parent to exist on the same meme", async () => {
    const { engine } = await withMeme();
    ok(await engine.createMeme({ ownerId: "bob", contentRef: "renders/m2.png", memeId: "m2" }));
    const other = ok(await engine.addComment("carol", "m2", "elsewhere"));

    expect(
      err(await engine.addComment("carol", "m1", "reply", { parentId: "nope" })).code,
    ).toBe("INVALID_PARENT");
    expect(
      err(await engine.addComment("carol", "m1", "reply", { parentId: other._id })).code,
    ).toBe("INVALID_PARENT");
    expect(
      err(await engine.addComment("carol", "m1", "self", { commentId: "c1", parentId: "c1" }))
        .code,
    ).toBe("INVALID_PARENT");
    expect(ok(await engine.getProfile("carol")).totalPoints).toBe(2);
  });

  it("returns the comment tree for a meme", async () => {
    const { engine, advance } = await withMeme();
    ok(await engine.addComment("bob", "m1", "first", { commentId: "c1" }));
    advance(1_000);
    ok(await engine.addComment("carol", "m1", "second", { commentId: "c2" }));
    advance(1_000);
    ok(await engine.addComment("alice", "m1", "thanks", { commentId: "r1", parentId: "c1" }));

    const tree = ok(await engine.listComments("m1"));
    expect(tree.map((node) => node.comment._id)).toEqual(["c1", "c2"]);
    expect(tree[0]?.replies.map((node) => node.comment.body)).toEqual(["thanks"]);

    const replyLog = ok(await engine.listActivity("alice")).find(
      (entry) => entry.kind === "comment_added",
    );
    expect(replyLog && engine.describeActivity(replyLog)).toBe("Replied to a comment");
    expect(err(await engine.listComments("missing")).code).toBe("MEME_NOT_FOUND");
  });

  it("replays a comment with the same id without crediting twice", async () => {
    const { engine, db } = await withMeme();
    const first = ok(await engine.addComment("carol", "m1", "hello", { commentId: "c1" }));
    const replay = ok(await engine.addComment("carol", "m1", "hello", { commentId: "c1" }));

    expect(replay).toEqual(first);
    expect(db.comments.size).toBe(1);
    expect(ok(await engine.getProfile("carol")).totalPoints).toBe(2);

    expect(
      err(await engine.addComment("bob", "m1", "hijack", { commentId: "c1" })).code,
    ).toBe("INVALID_INPUT");
  });
});

describe("memes", () => {
  it("credits creation once per meme id", async () => {
    const { engine } = await withMeme();

    const replay = ok(
      await engine.createMeme({ ownerId: "alice", contentRef: "renders/m1.png", memeId: "m1" }),
    );

    expect(replay.created).toBe(false);
    expect(replay.points.applied).toBe(false);
    const profile = ok(await engine.getProfile("alice"));
    expect(profile.totalPoints).toBe(10);
    expect(profile.stats.memesCreated).toBe(1);
  });

  it("validates owner, id and content", async () => {
    const { engine } = await withMeme();
    expect(
      err(await engine.createMeme({ ownerId: "ghost", contentRef: "renders/x.png" })).code,
    ).toBe("USER_NOT_FOUND");
    expect(
      err(await engine.createMeme({ ownerId: "bob", contentRef: "renders/m1.png", memeId: "m1" }))
        .code,
    ).toBe("INVALID_INPUT");
    expect(err(await engine.createMeme({ ownerId: "bob", contentRef: "  " })).code).toBe(
      "INVALID_INPUT",
    );
  });
});
