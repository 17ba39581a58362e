/**
 * WordSplitter — Boundary Detection
 *
 * Scans text once, left to right, and cuts it into words wherever an
 * enabled {@link Boundary} rule fires between two adjacent characters.
 *
 * Pure-function module: no state, no side effects. Never throws; text
 * without any boundary comes back as a single word.
 *
 * @module
 */
import { type Boundary, type BoundaryKind } from '../domain/Boundary.js';

// ── Character Classes ────────────────────────────────────

const UPPER = /^\p{Uppercase}$/u;
const LOWER = /^\p{Lowercase}$/u;
const LETTER = /^\p{Alphabetic}$/u;
const DIGIT = /^\p{Nd}$/u;

function isUpper(char: string): boolean { return UPPER.test(char); }
function isLower(char: string): boolean { return LOWER.test(char); }
function isLetter(char: string): boolean { return LETTER.test(char); }
function isDigit(char: string): boolean { return DIGIT.test(char); }

// ── Public API ───────────────────────────────────────────

/**
 * Split text into words using the given ruleset.
 *
 * @param text - Any text; empty and delimiter-only text yield `[]`
 * @param boundaries - Enabled rules
 * @returns Non-empty words in original order
 *
 * @example
 * ```typescript
 * splitWords('XMLHttpRequest', DEFAULT_BOUNDARIES);  // ['XML', 'Http', 'Request']
 * splitWords('__weird--var _name-', DEFAULT_BOUNDARIES);  // ['weird', 'var', 'name']
 * splitWords('10,000Days', DEFAULT_BOUNDARIES);  // ['10,000', 'Days']
 * ```
 */
export function splitWords(text: string, boundaries: readonly Boundary[]): string[] {
    const delimiters = new Set<string>();
    const kinds = new Set<BoundaryKind>();
    for (const boundary of boundaries) {
        kinds.add(boundary.kind);
        if (boundary.kind === 'delimiter') {
            for (const char of boundary.chars) delimiters.add(char);
        }
    }

    const lowerUpper = kinds.has('lowerUpper');
    const acronym = kinds.has('acronym');
    const letterDigit = kinds.has('letterDigit');

    const words: string[] = [];
    let current: string[] = [];

    const flush = (): void => {
        if (current.length > 0) words.push(current.join(''));
        current = [];
    };

    // Iterating a string yields code points, so astral characters stay whole
    for (const char of text) {
        if (delimiters.has(char)) {
            flush();
            continue;
        }

        const prev = current[current.length - 1];
        const beforePrev = current[current.length - 2];

        if (prev !== undefined) {
            if (acronym && beforePrev !== undefined
                && isUpper(beforePrev) && isUpper(prev) && isLower(char)) {
                // Cut before the last capital: it starts the next word
                current.pop();
                flush();
                current.push(prev);
            } else if (
                (lowerUpper && isLower(prev) && isUpper(char))
                || (letterDigit && isLetter(prev) && isDigit(char))
                || (letterDigit && isDigit(prev) && isLetter(char))
            ) {
                flush();
            }
        }

        current.push(char);
    }

    flush();
    return words;
}
