/**
 * Result\<T\> — success/failure without exceptions.
 *
 * Used where input is a *name or option* that may be wrong (for example
 * {@link parseCase}), never for text conversion, which cannot fail.
 *
 * @example
 * ```typescript
 * const result = parseCase(process.argv[2] ?? '');
 * if (!result.ok) return console.error(result.error);
 * toCase(text, result.value);
 * ```
 *
 * @module
 */

// ── Discriminated Union ──────────────────────────────────

/** @typeParam T - The success value type */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Failure {
    readonly ok: false;
    /** Human-readable reason */
    readonly error: string;
}

/**
 * Either `Success<T>` or `Failure`. Check `result.ok` to narrow.
 */
export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(error: string): Failure {
    return { ok: false, error };
}
