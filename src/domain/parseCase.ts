/**
 * Resolve a user-supplied convention name to a {@link Case}.
 *
 * Names are normalized with the library itself: any spelling that reads
 * as the same words matches (`'screaming_snake'`, `'SCREAMING-SNAKE'`,
 * `'Screaming Snake'`, `'screamingSnake'`).
 *
 * @module
 */
import { ALL_CASES, Case } from './Case.js';
import { toCase } from '../Casing.js';
import { fail, succeed, type Result } from '../result.js';

/** Extra names keyed by their camelCase spelling. */
const ALIASES: ReadonlyMap<string, Case> = new Map([
    ['constant', Case.SCREAMING_SNAKE],
    ['dash', Case.KEBAB],
]);

/**
 * @example
 * ```typescript
 * parseCase('upper-camel');  // { ok: true, value: Case.UPPER_CAMEL }
 * parseCase('spongebob');    // { ok: false, error: 'Unknown case "spongebob"...' }
 * ```
 */
export function parseCase(name: string): Result<Case> {
    const key = toCase(name, Case.CAMEL);
    const found = ALL_CASES.find(c => c === key) ?? ALIASES.get(key);
    if (found !== undefined) return succeed(found);
    return fail(`Unknown case "${name}". Expected one of: ${ALL_CASES.join(', ')}`);
}
