/**
 * Typed result for operations that can fail.
 *
 * How it fits:
 * - Repositories and services return `Result` instead of throwing, so a storage
 *   hiccup in one request never escapes as a raw driver exception.
 * - `Ok(null)` means "nothing there"; `Err(error)` means "the operation failed".
 *
 * Contract:
 * - Check `isOk()` / `isErr()` before `unwrap()`. On `Err`, `unwrap()` throws the
 *   contained error (wrapped when it is not an `Error`), so an unchecked unwrap
 *   fails loudly instead of handing back a bogus value.
 *
 * Pattern:
 * ```ts
 * const res = await repo.get(id);
 * if (res.isErr()) return ErrResult(res.error);
 * const value = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_default: T): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * Throws the contained error.
   *
   * @remarks
   * Only reachable when a caller skipped the `isErr()` guard.
   */
  unwrap(): T {
    if (this.error instanceof Error) throw this.error;
    throw new Error(`Result.unwrap called on Err: ${String(this.error)}`);
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<T, F>(fn(this.error));
  }
}

/** Build a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Build a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);
