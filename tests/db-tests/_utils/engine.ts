/**
 * Test harness: an engine over the in-process store with a controllable
 * clock. Nothing here touches the network.
 */
import { resolveEngagementConfig } from "../../../src/configuration";
import { MemoryDatabase } from "../../../src/db/memory";
import {
  createEngagementEngine,
  createMemoryRepositories,
  type EngagementEngine,
  type EngagementRepositories,
} from "../../../src/modules/engagement";
import type { Result } from "../../../src/utils/result";

export const START = "2026-03-02T12:00:00.000Z";

export interface TestClock {
  readonly clock: () => Date;
  set(iso: string): void;
  advance(ms: number): void;
}

export function createTestClock(start: string = START): TestClock {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    set: (iso) => {
      now = new Date(iso).getTime();
    },
    advance: (ms) => {
      now += ms;
    },
  };
}

export interface TestEngineOptions {
  config?: Parameters<typeof resolveEngagementConfig>[0];
  /** Shared store; a fresh one by default. */
  db?: MemoryDatabase;
  /** Replaces the memory repositories built over `db`. */
  repositories?: EngagementRepositories;
  start?: string;
}

export interface TestEngine extends TestClock {
  readonly engine: EngagementEngine;
  readonly db: MemoryDatabase;
}

export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const db = options.db ?? new MemoryDatabase();
  const time = createTestClock(options.start);
  const engine = createEngagementEngine({
    config: resolveEngagementConfig({ store: "memory", ...options.config }),
    repositories: options.repositories ?? createMemoryRepositories(db),
    clock: time.clock,
  });
  return { ...time, engine, db };
}

/** Unwrap an Ok result, failing the test with the error otherwise. */
export function ok<T, E>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw new Error(`expected Ok, got Err: ${String(result.error)}`);
  }
  return result.unwrap();
}

/** Return the error of an Err result, failing the test otherwise. */
export function err<T, E>(result: Result<T, E>): E {
  if (result.isOk()) {
    throw new Error("expected Err, got Ok");
  }
  return result.error;
}

export async function registerUsers(
  engine: EngagementEngine,
  ...userIds: string[]
): Promise<void> {
  for (const userId of userIds) {
    ok(await engine.registerUser(userId, userId.toUpperCase()));
  }
}
