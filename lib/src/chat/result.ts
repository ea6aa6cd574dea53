/**
 * Result type for stages whose failure the orchestrator absorbs.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Run an async stage and capture its outcome, including synchronous throws.
 */
export async function settle<T>(run: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
