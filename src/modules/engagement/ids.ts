import { randomUUID } from "node:crypto";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { EngagementError } from "./errors";

// Ids end up inside idempotency keys and dotted Mongo paths (`scores.<memeId>`).
const ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// Dropped by record parsing when a view is read back, so it cannot key a score.
const RESERVED_IDS = new Set(["__proto__"]);

export const isValidId = (value: string): boolean =>
  ID_PATTERN.test(value) && !RESERVED_IDS.has(value);

export const newId = (): string => randomUUID();

export function requireId(
  value: string,
  label: string,
): Result<string, EngagementError> {
  if (isValidId(value)) return OkResult(value);
  return ErrResult(
    new EngagementError("INVALID_INPUT", `Invalid ${label}: "${value}"`),
  );
}

/** Newest-first paging used by history and activity feeds. */
export interface PageOptions {
  limit?: number;
  /** Only entries strictly older than this instant. */
  before?: Date;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function clampPageSize(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_PAGE_SIZE;
  return Math.max(1, Math.min(MAX_PAGE_SIZE, Math.trunc(limit)));
}
