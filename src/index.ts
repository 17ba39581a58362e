/**
 * @module
 * @description
 * Naming conventions and their rendering rules.
 */
// ── Case Model ───────────────────────────────────────────
/** @category Case Model */
export { Case, type Pattern, type CaseSpec, PATTERNS, CASE_SPECS, ALL_CASES } from './domain/Case.js';
/** @category Case Model */
export {
    type Boundary, type BoundaryKind,
    type DelimiterBoundary, type LowerUpperBoundary, type AcronymBoundary, type LetterDigitBoundary,
    SPACE, UNDERSCORE, HYPHEN, LOWER_UPPER, ACRONYM, LETTER_DIGIT,
    delimiter, DEFAULT_BOUNDARIES, boundariesOf,
} from './domain/Boundary.js';
/** @category Case Model */
export { parseCase } from './domain/parseCase.js';

/**
 * @module
 * @description
 * Splitting text into words and rendering words back into text.
 */
// ── Words ────────────────────────────────────────────────
/** @category Words */
export { splitWords } from './words/WordSplitter.js';
/** @category Words */
export { applyPattern, renderWords } from './words/PatternRenderer.js';

// ── Conversion ───────────────────────────────────────────
/** @category Conversion */
export { toCase, fromCase, isCase, FromCasing } from './Casing.js';
/** @category Conversion */
export { Converter, createConverter } from './converter/Converter.js';
/** @category Conversion */
export {
    type ConverterOptions, type ConverterConfig,
    DEFAULT_CONVERTER_CONFIG, ConverterOptionsSchema,
} from './converter/ConverterConfig.js';
/** @category Conversion */
export { ConverterConfigError } from './converter/ConverterConfigError.js';

// ── Results & Observability ──────────────────────────────
/** @category Results */
export { type Result, type Success, type Failure, succeed, fail } from './result.js';
/** @category Observability */
export {
    type DebugEvent, type DebugObserverFn, type SplitEvent, type RenderEvent,
    createDebugObserver,
} from './observability/DebugObserver.js';
