/**
 * Result<T, E> for search outcomes that may legitimately have no answer.
 * Callers branch on isOk()/isErr() instead of catching.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  map<U>(_fn: (value: never) => U): Err<E> {
    return this;
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}
