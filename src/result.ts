/**
 * Result type for operations whose failures are expected and recoverable.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}
