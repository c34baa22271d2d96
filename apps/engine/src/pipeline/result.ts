/**
 * Stage result type
 *
 * Every pipeline stage resolves to a Result instead of throwing, so the
 * fallback branch is an explicit value the orchestrator matches on.
 */

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}
