import { describe, expect, it } from "vitest";
import { EngagementError, storeUnavailable } from "@/modules/engagement/errors";
import { clampPageSize, isValidId, requireId } from "@/modules/engagement/ids";

describe("EngagementError", () => {
  it("groups codes into kinds", () => {
    expect(new EngagementError("ALREADY_LIKED", "x").kind).toBe("DuplicateAction");
    expect(new EngagementError("SELF_LIKE", "x").kind).toBe("PolicyViolation");
    expect(new EngagementError("INVALID_PARENT", "x").kind).toBe("InvalidReference");
    expect(new EngagementError("STORE_UNAVAILABLE", "x").kind).toBe("StoreUnavailable");
  });

  it("marks only store failures as retryable", () => {
    expect(new EngagementError("STORE_UNAVAILABLE", "x").retryable).toBe(true);
    expect(new EngagementError("NOT_LIKED", "x").retryable).toBe(false);
  });

  it("wraps driver failures and passes classified errors through", () => {
    const cause = new Error("socket closed");
    const wrapped = storeUnavailable("Ledger.record", cause);
    expect(wrapped.code).toBe("STORE_UNAVAILABLE");
    expect(wrapped.message).toBe("Ledger.record: store unavailable");
    expect(wrapped.cause).toBe(cause);

    const classified = new EngagementError("USER_NOT_FOUND", "Unknown user u1");
    expect(storeUnavailable("Ledger.record", classified)).toBe(classified);
  });
});

describe("ids", () => {
  it("accepts url-safe ids up to 64 characters", () => {
    expect(isValidId("meme_01-A")).toBe(true);
    expect(isValidId("a".repeat(64))).toBe(true);
    expect(isValidId("a".repeat(65))).toBe(false);
    expect(isValidId("scores.m1")).toBe(false);
    expect(isValidId("")).toBe(false);
  });

  it("accepts object-method names but not __proto__", () => {
    expect(isValidId("constructor")).toBe(true);
    expect(isValidId("toString")).toBe(true);
    expect(isValidId("__proto__")).toBe(false);
  });

  it("reports the offending value", () => {
    const res = requireId("bad id", "meme id");
    expect(res.isErr() && res.error.message).toBe('Invalid meme id: "bad id"');
  });

  it("clamps page sizes", () => {
    expect(clampPageSize(undefined)).toBe(20);
    expect(clampPageSize(0)).toBe(1);
    expect(clampPageSize(500)).toBe(100);
    expect(clampPageSize(7.9)).toBe(7);
  });
});
