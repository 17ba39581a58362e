/**
 * Naming conventions a text value can be rendered in.
 *
 * Each member maps to exactly one {@link CaseSpec} in {@link CASE_SPECS}:
 * the casing pattern applied to every word and the delimiter that joins
 * them.
 *
 * @example
 * ```typescript
 * import { Case, toCase } from 'caseweave';
 *
 * toCase('ronnie james dio', Case.TITLE);   // 'Ronnie James Dio'
 * toCase('Ronnie_James_dio', Case.CAMEL);   // 'ronnieJamesDio'
 * toCase('RONNIE_JAMES_DIO', Case.TRAIN);   // 'Ronnie-James-Dio'
 * ```
 */
export enum Case {
    /** `my variable name` */
    LOWER = "lower",
    /** `MY VARIABLE NAME` */
    UPPER = "upper",
    /** `My Variable Name` */
    TITLE = "title",
    /** `myVariableName` */
    CAMEL = "camel",
    /** `MyVariableName` */
    PASCAL = "pascal",
    /** `MyVariableName`, same rendering as {@link Case.PASCAL} */
    UPPER_CAMEL = "upperCamel",
    /** `my_variable_name` */
    SNAKE = "snake",
    /** `MY_VARIABLE_NAME` */
    SCREAMING_SNAKE = "screamingSnake",
    /** `my-variable-name` */
    KEBAB = "kebab",
    /** `MY-VARIABLE-NAME` */
    COBOL = "cobol",
    /** `My-Variable-Name` */
    TRAIN = "train",
    /** `mY vARIABLE nAME` */
    TOGGLE = "toggle",
    /** `mY vArIaBlE nAmE` */
    ALTERNATING = "alternating"
}

/**
 * How letters inside each word are cased.
 *
 * - `lowercase` / `uppercase`: every letter
 * - `capital`: first character upper, the rest lower
 * - `camel`: first word lowercase, every later word `capital`
 * - `toggle`: first character lower, the rest upper
 * - `alternating`: lower/upper alternation carried across the whole sequence
 */
export type Pattern =
    | 'lowercase'
    | 'uppercase'
    | 'capital'
    | 'camel'
    | 'toggle'
    | 'alternating';

/** All patterns, in a stable order. */
export const PATTERNS = [
    'lowercase', 'uppercase', 'capital', 'camel', 'toggle', 'alternating',
] as const satisfies readonly Pattern[];

/** Rendering facts of a single {@link Case}. */
export interface CaseSpec {
    readonly pattern: Pattern;
    /** Literal text inserted between words (possibly empty) */
    readonly delimiter: string;
}

// ── Case Table ───────────────────────────────────────────

export const CASE_SPECS: Readonly<Record<Case, CaseSpec>> = Object.freeze<Record<Case, CaseSpec>>({
    [Case.LOWER]:           { pattern: 'lowercase', delimiter: ' ' },
    [Case.UPPER]:           { pattern: 'uppercase', delimiter: ' ' },
    [Case.TITLE]:           { pattern: 'capital', delimiter: ' ' },
    [Case.CAMEL]:           { pattern: 'camel', delimiter: '' },
    [Case.PASCAL]:          { pattern: 'capital', delimiter: '' },
    [Case.UPPER_CAMEL]:     { pattern: 'capital', delimiter: '' },
    [Case.SNAKE]:           { pattern: 'lowercase', delimiter: '_' },
    [Case.SCREAMING_SNAKE]: { pattern: 'uppercase', delimiter: '_' },
    [Case.KEBAB]:           { pattern: 'lowercase', delimiter: '-' },
    [Case.COBOL]:           { pattern: 'uppercase', delimiter: '-' },
    [Case.TRAIN]:           { pattern: 'capital', delimiter: '-' },
    [Case.TOGGLE]:          { pattern: 'toggle', delimiter: ' ' },
    [Case.ALTERNATING]:     { pattern: 'alternating', delimiter: ' ' },
});

/** Every {@link Case} member, in declaration order. */
export const ALL_CASES: readonly Case[] = Object.freeze(Object.values(Case));
