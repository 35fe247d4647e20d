/**
 * Engagement error taxonomy.
 *
 * Every service returns `Result<T, EngagementError>`. The `code` names the
 * concrete failure; the `kind` groups codes into the four families callers
 * branch on:
 * - `DuplicateAction`: uniqueness already satisfied (a repeated like).
 * - `InvalidReference`: a meme, comment, user or like that does not exist or
 *   does not match.
 * - `PolicyViolation`: input rejected by a rule (self-like, empty body).
 * - `StoreUnavailable`: infrastructure failure; retry with the same key.
 */

export type EngagementErrorKind =
  | "DuplicateAction"
  | "InvalidReference"
  | "PolicyViolation"
  | "StoreUnavailable";

export type EngagementErrorCode =
  | "ALREADY_LIKED"
  | "SELF_LIKE"
  | "EMPTY_BODY"
  | "BODY_TOO_LONG"
  | "INVALID_AMOUNT"
  | "INVALID_INPUT"
  | "INVALID_PARENT"
  | "MEME_NOT_FOUND"
  | "USER_NOT_FOUND"
  | "NOT_LIKED"
  | "STORE_UNAVAILABLE";

const KIND_BY_CODE: Record<EngagementErrorCode, EngagementErrorKind> = {
  ALREADY_LIKED: "DuplicateAction",
  SELF_LIKE: "PolicyViolation",
  EMPTY_BODY: "PolicyViolation",
  BODY_TOO_LONG: "PolicyViolation",
  INVALID_AMOUNT: "PolicyViolation",
  INVALID_INPUT: "PolicyViolation",
  INVALID_PARENT: "InvalidReference",
  MEME_NOT_FOUND: "InvalidReference",
  USER_NOT_FOUND: "InvalidReference",
  NOT_LIKED: "InvalidReference",
  STORE_UNAVAILABLE: "StoreUnavailable",
};

export class EngagementError extends Error {
  readonly kind: EngagementErrorKind;

  constructor(
    public readonly code: EngagementErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EngagementError";
    this.kind = KIND_BY_CODE[code];
  }

  /** Only infrastructure failures are worth retrying. */
  get retryable(): boolean {
    return this.kind === "StoreUnavailable";
  }
}

/**
 * Wrap a repository failure. Already-classified errors pass through so a
 * validation outcome raised inside a unit of work keeps its code.
 */
export function storeUnavailable(
  scope: string,
  cause: unknown,
): EngagementError {
  if (cause instanceof EngagementError) return cause;
  return new EngagementError(
    "STORE_UNAVAILABLE",
    `${scope}: store unavailable`,
    { cause },
  );
}
