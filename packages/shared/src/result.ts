export type ErrorCode = "validation" | "storage_unavailable" | "provider_unavailable" | "invariant_violation";

export type Ok<T> = { ok: true } & T;
export type Fail<E extends string = ErrorCode> = { ok: false; error: E; message?: string };

/** `{ ok: true, ...value }` on success, `{ ok: false, error }` otherwise. */
export type Result<T extends object = object, E extends string = ErrorCode> = Ok<T> | Fail<E>;

export function fail<E extends string>(error: E, message?: string): Fail<E> {
  return message === undefined ? { ok: false, error } : { ok: false, error, message };
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function ok<T extends object>(value: T): Ok<T> {
  return { ...value, ok: true };
}

export const USER_ERROR_MESSAGE = "Произошла ошибка. Пожалуйста, попробуйте позже.";
