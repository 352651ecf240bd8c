import { ShardlineError, type ErrorKind } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = ShardlineError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// Runs an async boundary call and tags any thrown error with the boundary's kind.
export async function attempt<T>(
  kind: ErrorKind,
  action: string,
  fn: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toShardlineError(kind, action, error));
  }
}

export function toShardlineError(kind: ErrorKind, action: string, error: unknown): ShardlineError {
  if (error instanceof ShardlineError) return error;
  return new ShardlineError(`${action}: ${formatErrorMessage(error)}`, kind, error);
}
