/**
 * Explicit success/failure value returned by pipeline operations.
 */
export type Result<T, E = PipelineFailure> =
    | { ok: true; value: T }
    | { ok: false; error: E };

/**
 * Failure categories.
 *
 * - `invalid-input`: the operation could not run (e.g. blank narrative)
 * - `no-data`: the operation ran but the oracle yielded nothing usable
 * - `table-read`: the entity table file is missing or malformed
 * - `narrative-read`: the narrative file is missing or unreadable
 * - `table-write` / `narrative-write`: the file could not be written
 */
export type FailureKind =
    | 'invalid-input'
    | 'no-data'
    | 'table-read'
    | 'narrative-read'
    | 'table-write'
    | 'narrative-write';

export interface PipelineFailure {
    kind: FailureKind;
    message: string;
}

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function fail(kind: FailureKind, message: string): Result<never, PipelineFailure> {
    return { ok: false, error: { kind, message } };
}
