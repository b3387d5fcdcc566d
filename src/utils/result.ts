/**
 * Typed result for operations that can fail.
 *
 * Repositories, the game engine and command handlers return a `Result` instead
 * of throwing, so a single failed query or refused action never takes the
 * process down. `Ok(null)` means "nothing found"; `Err(error)` means the
 * operation failed.
 *
 * `Err.unwrap()` does not throw: it logs a warning and returns `undefined`.
 * Callers must check `isOk()` / `isErr()` first.
 *
 * ```ts
 * const res = await questions.pickQuestion(guildId, sessionId);
 * if (res.isErr()) return ErrResult(res.error);
 * const question = res.unwrap();
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
   * Logs and returns `undefined`; see the module comment.
   */
  unwrap(): T {
    console.warn("[result] unwrap called on Err; returning undefined.", this.error);
    return undefined as unknown as T;
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  inspectErr(fn: (error: E) => void): Result<T, E> {
    fn(this.error);
    return this;
  }
}

export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Wraps an unknown thrown value into an `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
