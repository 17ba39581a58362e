/**
 * PatternRenderer — Casing and Joining
 *
 * Applies a {@link Pattern} to a word sequence and joins the result with
 * a delimiter. Only cased letters change; digits and punctuation pass
 * through untouched.
 *
 * @module
 */
import { CASE_SPECS, type Case, type Pattern } from '../domain/Case.js';

// ── Word Casing ──────────────────────────────────────────

function capitalize(word: string): string {
    const [first = '', ...rest] = word;
    return first.toUpperCase() + rest.join('').toLowerCase();
}

function toggle(word: string): string {
    const [first = '', ...rest] = word;
    return first.toLowerCase() + rest.join('').toUpperCase();
}

function isCased(char: string): boolean {
    return char.toLowerCase() !== char.toUpperCase();
}

/**
 * Alternate lower/upper over every cased letter of the sequence.
 * The counter runs across word boundaries and skips uncased characters.
 */
function alternate(words: readonly string[]): string[] {
    let upper = false;
    return words.map(word => {
        let out = '';
        for (const char of word) {
            if (isCased(char)) {
                out += upper ? char.toUpperCase() : char.toLowerCase();
                upper = !upper;
            } else {
                out += char;
            }
        }
        return out;
    });
}

// ── Public API ───────────────────────────────────────────

/**
 * Case every word according to a pattern, without joining.
 *
 * @example
 * ```typescript
 * applyPattern(['xml', 'HTTP', 'request'], 'camel');  // ['xml', 'Http', 'Request']
 * ```
 */
export function applyPattern(words: readonly string[], pattern: Pattern): string[] {
    switch (pattern) {
        case 'lowercase':
            return words.map(word => word.toLowerCase());
        case 'uppercase':
            return words.map(word => word.toUpperCase());
        case 'capital':
            return words.map(capitalize);
        case 'camel':
            return words.map((word, i) => i === 0 ? word.toLowerCase() : capitalize(word));
        case 'toggle':
            return words.map(toggle);
        case 'alternating':
            return alternate(words);
    }
}

/**
 * Render a word sequence in the given convention.
 *
 * @returns The joined text; `''` for an empty sequence
 */
export function renderWords(words: readonly string[], target: Case): string {
    const { pattern, delimiter } = CASE_SPECS[target];
    return applyPattern(words, pattern).join(delimiter);
}
