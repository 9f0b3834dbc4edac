import { canonicalize } from "./canonical.js";

/** A coded refusal; `details` is stored in canonical form so it can be digested. */
export interface ResultError {
  readonly code: string;
  readonly explain: string;
  readonly details?: unknown;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ResultError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(code: string, explain: string, details?: unknown): Result<T> => ({
  ok: false,
  error: details === undefined ? { code, explain } : { code, explain, details: canonicalize(details) },
});
