/**
 * Typed listener registry shared by every hook module.
 *
 * `emit` runs all listeners concurrently and resolves once each has settled.
 * A listener that throws or rejects is logged and never reaches the emitter,
 * so publishing after a committed write cannot fail that write. Because the
 * returned promise never rejects, emitters may leave it unawaited.
 */
export type HookListener<Args extends unknown[]> = (
  ...args: Args
) => Promise<void> | void;

export interface EventHookOptions {
  /** Used as the log tag for failing listeners. */
  name?: string;
}

export interface EventHook<Args extends unknown[]> {
  on(listener: HookListener<Args>): () => void;
  once(listener: HookListener<Args>): () => void;
  off(listener: HookListener<Args>): void;
  emit(...args: Args): Promise<void>;
  clear(): void;
  listenerCount(): number;
}

export function createEventHook<Args extends unknown[]>(
  options: EventHookOptions = {},
): EventHook<Args> {
  const tag = options.name ?? "anonymous";
  const listeners = new Set<HookListener<Args>>();

  const off = (listener: HookListener<Args>): void => {
    listeners.delete(listener);
  };

  const on = (listener: HookListener<Args>): (() => void) => {
    listeners.add(listener);
    return () => off(listener);
  };

  const once = (listener: HookListener<Args>): (() => void) => {
    const wrapped: HookListener<Args> = (...args) => {
      off(wrapped);
      return listener(...args);
    };
    return on(wrapped);
  };

  const emit = async (...args: Args): Promise<void> => {
    const current = [...listeners];
    const results = await Promise.allSettled(
      current.map(async (listener) => listener(...args)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.warn(`[Hooks:${tag}] listener failed`, result.reason);
      }
    }
  };

  return {
    on,
    once,
    off,
    emit,
    clear: () => listeners.clear(),
    listenerCount: () => listeners.size,
  };
}
