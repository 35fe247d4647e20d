import { afterEach, describe, expect, it, vi } from "vitest";
import { createEventHook } from "@/events/hooks/createEventHook";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createEventHook", () => {
  it("delivers arguments to every listener", async () => {
    const hook = createEventHook<[string, number]>({ name: "test" });
    const seen: string[] = [];
    hook.on((name, value) => {
      seen.push(`${name}:${value}`);
    });
    hook.on(async (name) => {
      seen.push(`async:${name}`);
    });

    await hook.emit("a", 1);
    expect(seen).toEqual(["a:1", "async:a"]);
  });

  it("unsubscribes through the returned function", async () => {
    const hook = createEventHook<[]>();
    const listener = vi.fn();
    const unsubscribe = hook.on(listener);
    unsubscribe();
    await hook.emit();
    expect(listener).not.toHaveBeenCalled();
    expect(hook.listenerCount()).toBe(0);
  });

  it("runs once listeners a single time", async () => {
    const hook = createEventHook<[number]>();
    const listener = vi.fn();
    hook.once(listener);
    await hook.emit(1);
    await hook.emit(2);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(1);
  });

  it("logs failing listeners without rejecting", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const hook = createEventHook<[]>({ name: "fragile" });
    const failure = new Error("listener broke");
    const survivor = vi.fn();
    hook.on(() => {
      throw failure;
    });
    hook.on(survivor);

    await expect(hook.emit()).resolves.toBeUndefined();
    expect(survivor).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[Hooks:fragile] listener failed", failure);
  });

  it("drops every listener on clear", () => {
    const hook = createEventHook<[]>();
    hook.on(() => undefined);
    hook.on(() => undefined);
    hook.clear();
    expect(hook.listenerCount()).toBe(0);
  });
});
