/**
 * Result of a fire-and-forget call. Failures are logged by the client and
 * handed back instead of thrown.
 */
export type Outcome<T = undefined> = { ok: true; value: T } | { ok: false; error: Error };

export function success(): Outcome;
export function success<T>(value: T): Outcome<T>;
export function success<T>(value?: T): Outcome<T | undefined> {
  return { ok: true, value };
}

export function failure<T = undefined>(error: unknown): Outcome<T> {
  return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}
