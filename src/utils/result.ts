/**
 * Success or failure of an operation, returned instead of thrown.
 * Narrow on `isOk` / `isErr` before reading `value` or `error`.
 *
 * @example
 * const found = store.find(id);
 * const result = found ? Ok(found) : Err("missing");
 * if (result.isErr) return result;
 */
export type OkResult<T> = {
  readonly isOk: true;
  readonly isErr: false;
  readonly value: T;
  readonly error: null;
};

export type ErrResult<E> = {
  readonly isOk: false;
  readonly isErr: true;
  readonly value: null;
  readonly error: E;
};

export type Result<T, E> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): OkResult<T> => ({
  isOk: true,
  isErr: false,
  value,
  error: null,
});

export const Err = <E>(error: E): ErrResult<E> => ({
  isOk: false,
  isErr: true,
  value: null,
  error,
});
