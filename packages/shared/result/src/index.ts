export type Ok<T> = { readonly ok: true; readonly value: T };
export type Fail<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = Ok<T> | Fail<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const fail = <E>(error: E): Fail<E> => ({ ok: false, error });

export const toError = (cause: unknown, fallback: string): Error =>
  cause instanceof Error ? cause : new Error(typeof cause === 'string' ? cause : fallback);

