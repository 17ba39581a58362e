/**
 * Boundary rules: where one word ends and the next begins.
 *
 * A ruleset is a plain array of rules. {@link DEFAULT_BOUNDARIES} enables
 * every rule; {@link boundariesOf} narrows the set to the rules a given
 * {@link Case} actually uses to delimit its own words.
 *
 * @module
 */
import { Case } from './Case.js';

// ── Rules (Discriminated Union) ──────────────────────────

/** Explicit separator characters. The characters never appear in a word. */
export interface DelimiterBoundary {
    readonly kind: 'delimiter';
    /** Every character of this string is a separator */
    readonly chars: string;
}

/** `aB` splits as `a` / `B`. */
export interface LowerUpperBoundary {
    readonly kind: 'lowerUpper';
}

/** `ABc` splits as `A` / `Bc`, so `XMLHttp` yields `XML` / `Http`. */
export interface AcronymBoundary {
    readonly kind: 'acronym';
}

/** `a1` and `1a` both split. */
export interface LetterDigitBoundary {
    readonly kind: 'letterDigit';
}

export type Boundary =
    | DelimiterBoundary
    | LowerUpperBoundary
    | AcronymBoundary
    | LetterDigitBoundary;

export type BoundaryKind = Boundary['kind'];

// ── Named Rules ──────────────────────────────────────────

/** ASCII whitespace */
export const SPACE: DelimiterBoundary = Object.freeze({ kind: 'delimiter', chars: ' \t\n\r\f\v' });
export const UNDERSCORE: DelimiterBoundary = Object.freeze({ kind: 'delimiter', chars: '_' });
export const HYPHEN: DelimiterBoundary = Object.freeze({ kind: 'delimiter', chars: '-' });
export const LOWER_UPPER: LowerUpperBoundary = Object.freeze({ kind: 'lowerUpper' });
export const ACRONYM: AcronymBoundary = Object.freeze({ kind: 'acronym' });
export const LETTER_DIGIT: LetterDigitBoundary = Object.freeze({ kind: 'letterDigit' });

/** Create a delimiter rule for arbitrary separator characters. */
export function delimiter(chars: string): DelimiterBoundary {
    return Object.freeze({ kind: 'delimiter', chars });
}

// ── Rulesets ─────────────────────────────────────────────

/** Maximal splitting, used when the source convention is unknown. */
export const DEFAULT_BOUNDARIES: readonly Boundary[] = Object.freeze([
    SPACE, UNDERSCORE, HYPHEN, LOWER_UPPER, ACRONYM, LETTER_DIGIT,
]);

const SPACED: readonly Boundary[] = Object.freeze([SPACE]);
const SNAKED: readonly Boundary[] = Object.freeze([UNDERSCORE]);
const DASHED: readonly Boundary[] = Object.freeze([HYPHEN]);
// Digits are split too, so `myVariable22Name` reads as four words.
const COMPACT: readonly Boundary[] = Object.freeze([LOWER_UPPER, ACRONYM, LETTER_DIGIT]);

const CASE_BOUNDARIES: Readonly<Record<Case, readonly Boundary[]>> = Object.freeze<Record<Case, readonly Boundary[]>>({
    [Case.LOWER]: SPACED,
    [Case.UPPER]: SPACED,
    [Case.TITLE]: SPACED,
    [Case.TOGGLE]: SPACED,
    [Case.ALTERNATING]: SPACED,
    [Case.CAMEL]: COMPACT,
    [Case.PASCAL]: COMPACT,
    [Case.UPPER_CAMEL]: COMPACT,
    [Case.SNAKE]: SNAKED,
    [Case.SCREAMING_SNAKE]: SNAKED,
    [Case.KEBAB]: DASHED,
    [Case.COBOL]: DASHED,
    [Case.TRAIN]: DASHED,
});

/**
 * The narrow ruleset of a declared source convention.
 *
 * @example
 * ```typescript
 * boundariesOf(Case.SNAKE);  // [UNDERSCORE], so `a-b_c` reads as `a-b` / `c`
 * ```
 */
export function boundariesOf(source: Case): readonly Boundary[] {
    return CASE_BOUNDARIES[source];
}
