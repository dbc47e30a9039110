/** Outcome of a validation or synthesis call. */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

/** Transforms the value of a successful result. */
export const mapResult = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  result.ok ? ok(fn(result.value)) : result;

/**
 * Error thrown by `unwrapDdl` for callers that prefer exceptions.
 * Carries the structured error so it can still be inspected.
 */
export class DdlValidationError<E extends { kind: string }> extends Error {
  constructor(readonly detail: E, message: string) {
    super(message);
    this.name = 'DdlValidationError';
  }
}

/** Returns the value, or throws a DdlValidationError described by `describe`. */
export const unwrapDdl = <T, E extends { kind: string }>(
  result: Result<T, E>,
  describe: (error: E) => string
): T => {
  if (!result.ok) {
    throw new DdlValidationError(result.error, describe(result.error));
  }
  return result.value;
};
