/**
 * Result type for fetch and validation paths: failures are values, not throws.
 *
 *   const page = await fetcher.fetch(channel, 'videos', null);
 *   if (page.ok) {
 *     write(page.value.items);
 *   } else {
 *     handle(page.error);
 *   }
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
