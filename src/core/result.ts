import { ScoutError } from "./errors";

export type Result<T, E extends ScoutError = ScoutError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends ScoutError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
