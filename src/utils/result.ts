/**
 * Typed result for operations that can fail as part of normal play.
 *
 * Where it fits:
 * - Engine services (aging, skill allocation, manual attributes) return a `Result` for
 *   policy outcomes instead of throwing, so the caller can show the reason and retry.
 * - Parameter mistakes in pure primitives (bad dice recipes, malformed tables) still throw.
 *
 * Contract:
 * - Check `isOk()`/`isErr()` before reading `value`/`error`.
 * - `Err.unwrap()` throws the contained error when it is an `Error`, so an unchecked
 *   unwrap fails loudly at the call site instead of leaking `undefined`.
 *
 * Recommended pattern:
 * ```ts
 * const res = engine.increment("bows");
 * if (res.isErr()) return ErrResult(res.error);
 * const level = res.value;
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

  /** Returns the contained value. Total on `Ok`. */
  unwrap(): T {
    return this.value;
  }

  unwrapOr(_default: T): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }

  inspect(fn: (value: T) => void): Result<T, E> {
    fn(this.value);
    return this;
  }

  inspectErr(_fn: (error: E) => void): Result<T, E> {
    return this;
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
   * There is no value to return, so this throws.
   *
   * @remarks
   * Callers are expected to branch on `isOk()`/`isErr()` first; reaching this is a bug.
   */
  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
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

  inspect(_fn: (value: T) => void): Result<T, E> {
    return this;
  }

  inspectErr(fn: (error: E) => void): Result<T, E> {
    fn(this.error);
    return this;
  }
}

/** Builds a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok<T, E>(value);

/** Builds a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err<T, E>(error);
