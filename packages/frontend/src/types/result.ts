/**
 * Result type for functional error handling
 *
 * Expected failures (a rejected projection, an unreadable config file) travel
 * as values. Exceptions are reserved for internal compiler errors.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});
