/**
 * ConverterConfigError — rejected converter options.
 *
 * Thrown by {@link createConverter} only; a converter that was built
 * never throws.
 *
 * @example
 * ```typescript
 * try {
 *     createConverter({ to: 'snake_case' as Case });
 * } catch (e) {
 *     if (e instanceof ConverterConfigError) {
 *         console.log(e.message);  // "Invalid converter options:\n  • 'to': Invalid enum value..."
 *         console.log(e.cause);    // Original ZodError
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';

export class ConverterConfigError extends Error {
    /** Dotted paths of every rejected option, e.g. `boundaries.0.kind` */
    readonly paths: readonly string[];

    constructor(zodError: ZodError) {
        const paths = zodError.issues.map(issue =>
            issue.path.length > 0 ? issue.path.join('.') : '(root)');

        const fieldErrors = zodError.issues
            .map((issue, i) => `  • '${paths[i] ?? '(root)'}': ${issue.message}`)
            .join('\n');

        super(`Invalid converter options:\n${fieldErrors}`, { cause: zodError });
        this.name = 'ConverterConfigError';
        this.paths = paths;
    }
}
