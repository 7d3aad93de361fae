type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Success or failure of a boundary operation: config validation, seed
 * parsing, command line flags. Core grid code never returns one.
 *
 * @example
 * ```typescript
 * const config = validateConfig(input)
 *   .map((c) => ({ ...c, tickIntervalMs: 100 }))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  isOk(): boolean {
    return this.outcome.ok;
  }

  isErr(): boolean {
    return !this.outcome.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.outcome.ok
      ? Result.ok(fn(this.outcome.value))
      : Result.err(this.outcome.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.outcome.ok
      ? Result.ok(this.outcome.value)
      : Result.err(fn(this.outcome.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.outcome.ok
      ? fn(this.outcome.value)
      : Result.err(this.outcome.error);
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this.outcome.ok
      ? onOk(this.outcome.value)
      : onErr(this.outcome.error);
  }

  getOrElse(fallback: T): T {
    return this.outcome.ok ? this.outcome.value : fallback;
  }

  /** The value, or the stored error thrown as is */
  getOrThrow(): T {
    if (!this.outcome.ok) throw this.outcome.error;
    return this.outcome.value;
  }

  get value(): T {
    if (!this.outcome.ok) throw new Error("Result holds an error, not a value");
    return this.outcome.value;
  }

  get error(): E {
    if (this.outcome.ok) throw new Error("Result holds a value, not an error");
    return this.outcome.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
