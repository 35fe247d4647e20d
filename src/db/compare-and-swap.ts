/**
 * Compare-and-swap on one field of one document, for counters that change
 * outside a multi-document transaction (login streaks).
 *
 * `read` returns `null` when the document does not exist; the swap then
 * resolves to `null` without writing. When `next` yields a value `equals`
 * treats as unchanged, nothing is written either. `write` answers `false`
 * only when the stored value no longer matches `expected`; the value is then
 * re-read and `next` runs again, so `next` must be pure.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";

export interface SwapOutcome<T> {
  readonly before: T;
  readonly after: T;
  readonly changed: boolean;
}

export interface SwapOptions<T> {
  /** Names the value in the exhaustion error. */
  label: string;
  attempts: number;
  read: () => Promise<Result<T | null, Error>>;
  next: (current: T) => T;
  equals: (a: T, b: T) => boolean;
  write: (expected: T, next: T) => Promise<Result<boolean, Error>>;
}

export async function compareAndSwap<T>(
  options: SwapOptions<T>,
): Promise<Result<SwapOutcome<T> | null, Error>> {
  if (options.attempts < 1) {
    return ErrResult(new Error(`${options.label}: attempts must be at least 1`));
  }

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    const read = await options.read();
    if (read.isErr()) return ErrResult(read.error);
    const current = read.unwrap();
    if (current === null) return OkResult(null);

    const next = options.next(current);
    if (options.equals(current, next)) {
      return OkResult({ before: current, after: current, changed: false });
    }

    const written = await options.write(current, next);
    if (written.isErr()) return ErrResult(written.error);
    if (written.unwrap()) return OkResult({ before: current, after: next, changed: true });
  }

  return ErrResult(
    new Error(`${options.label} kept conflicting after ${options.attempts} attempts`),
  );
}
