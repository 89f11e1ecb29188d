// ============================================================================
// Result - Success/failure values for calls whose failure is an expected outcome
// ============================================================================

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}
