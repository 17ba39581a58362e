/**
 * ConverterConfig — options, defaults and validation for {@link Converter}.
 *
 * Options are validated with zod, then merged over
 * {@link DEFAULT_CONVERTER_CONFIG}. Explicit `boundaries` win over
 * `from`; explicit `pattern` / `delimiter` win over `to`.
 *
 * @module
 */
import { z } from 'zod';
import { CASE_SPECS, Case, PATTERNS, type Pattern } from '../domain/Case.js';
import { DEFAULT_BOUNDARIES, boundariesOf, type Boundary } from '../domain/Boundary.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { ConverterConfigError } from './ConverterConfigError.js';

// ── Options ──────────────────────────────────────────────

/** Options accepted by `createConverter()`. Every field is optional. */
export interface ConverterOptions {
    /** Source convention; selects its boundaries */
    readonly from?: Case;
    /** Explicit boundary rules; overrides `from` */
    readonly boundaries?: readonly Boundary[];
    /** Target convention; supplies pattern and delimiter */
    readonly to?: Case;
    /** Overrides the pattern of `to` */
    readonly pattern?: Pattern;
    /** Overrides the delimiter of `to` */
    readonly delimiter?: string;
    /** Receives a `split` and a `render` event per conversion */
    readonly debug?: DebugObserverFn;
}

/** Fully resolved converter configuration. */
export interface ConverterConfig {
    readonly boundaries: readonly Boundary[];
    /** `undefined` keeps words verbatim */
    readonly pattern: Pattern | undefined;
    readonly delimiter: string;
    readonly debug: DebugObserverFn | undefined;
}

// ── Defaults ─────────────────────────────────────────────

/** Split on everything, keep words as they are, join with nothing. */
export const DEFAULT_CONVERTER_CONFIG: ConverterConfig = Object.freeze({
    boundaries: DEFAULT_BOUNDARIES,
    pattern: undefined,
    delimiter: '',
    debug: undefined,
});

// ── Schema ───────────────────────────────────────────────

const BoundarySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('delimiter'), chars: z.string().min(1, 'Delimiter rule needs at least one character') }),
    z.object({ kind: z.literal('lowerUpper') }),
    z.object({ kind: z.literal('acronym') }),
    z.object({ kind: z.literal('letterDigit') }),
]);

export const ConverterOptionsSchema = z.object({
    from: z.nativeEnum(Case).optional(),
    boundaries: z.array(BoundarySchema).optional(),
    to: z.nativeEnum(Case).optional(),
    pattern: z.enum(PATTERNS).optional(),
    delimiter: z.string().optional(),
    debug: z.custom<DebugObserverFn>(value => typeof value === 'function', 'Expected a function').optional(),
}).strict();

// ── Merge ────────────────────────────────────────────────

/**
 * Validate options and resolve them against the defaults.
 *
 * @throws {ConverterConfigError} When an option has the wrong shape
 */
export function resolveConfig(options: ConverterOptions = {}): ConverterConfig {
    const result = ConverterOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new ConverterConfigError(result.error);
    }

    const target = options.to !== undefined ? CASE_SPECS[options.to] : undefined;

    return Object.freeze({
        boundaries: options.boundaries
            ?? (options.from !== undefined ? boundariesOf(options.from) : DEFAULT_CONVERTER_CONFIG.boundaries),
        pattern: options.pattern ?? target?.pattern ?? DEFAULT_CONVERTER_CONFIG.pattern,
        delimiter: options.delimiter ?? target?.delimiter ?? DEFAULT_CONVERTER_CONFIG.delimiter,
        debug: options.debug ?? DEFAULT_CONVERTER_CONFIG.debug,
    });
}
