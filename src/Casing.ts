/**
 * Casing — the conversion surface.
 *
 * `toCase()` splits on every boundary; `fromCase()` remembers a declared
 * source convention so that only that convention's boundaries are used.
 * Conversion never fails: unrecognized input degrades to fewer, longer
 * words.
 *
 * @example
 * ```typescript
 * import { Case, toCase, fromCase } from 'caseweave';
 *
 * toCase('2020-04-16_my_cat_cali', Case.TITLE);
 * // '2020 04 16 My Cat Cali'
 *
 * fromCase('2020-04-16_my_cat_cali', Case.SNAKE).toCase(Case.TITLE);
 * // '2020-04-16 My Cat Cali'
 * ```
 *
 * @module
 */
import { type Case } from './domain/Case.js';
import { DEFAULT_BOUNDARIES, boundariesOf } from './domain/Boundary.js';
import { splitWords } from './words/WordSplitter.js';
import { renderWords } from './words/PatternRenderer.js';

/**
 * Convert text to a convention, splitting on every boundary rule.
 *
 * @example
 * ```typescript
 * toCase('XMLHttpRequest', Case.SNAKE);  // 'xml_http_request'
 * toCase('Hello, world!', Case.UPPER);   // 'HELLO, WORLD!'
 * ```
 */
export function toCase(text: string, target: Case): string {
    return renderWords(splitWords(text, DEFAULT_BOUNDARIES), target);
}

/**
 * Declare the convention `text` is already written in.
 * Nothing is split until {@link FromCasing.toCase} is called.
 */
export function fromCase(text: string, source: Case): FromCasing {
    return new FromCasing(text, source);
}

/**
 * Whether `text` is already rendered in `target`: reading it as `target`
 * and writing it back changes nothing. The empty string is in every case.
 *
 * @example
 * ```typescript
 * isCase('my_var', Case.SNAKE);   // true
 * isCase('_my_var', Case.SNAKE);  // false
 * ```
 */
export function isCase(text: string, target: Case): boolean {
    return fromCase(text, target).toCase(target) === text;
}

/**
 * Text paired with its declared source convention.
 *
 * @example
 * ```typescript
 * fromCase('ninety-nine_problems', Case.SNAKE).toCase(Case.TITLE);
 * // 'Ninety-nine Problems'
 * ```
 */
export class FromCasing {
    public constructor(
        public readonly text: string,
        public readonly source: Case,
    ) {}

    /** Split with the source convention's boundaries, render in `target`. */
    public toCase(target: Case): string {
        return renderWords(splitWords(this.text, boundariesOf(this.source)), target);
    }

    /** Re-declare the source convention. The text is kept; nothing is split. */
    public fromCase(source: Case): FromCasing {
        return new FromCasing(this.text, source);
    }

    /** Words as the declared source convention sees them. */
    public words(): string[] {
        return splitWords(this.text, boundariesOf(this.source));
    }
}
