/**
 * Converter — configurable split-then-render pipeline.
 *
 * For conversions the fixed {@link Case} table does not cover: custom
 * boundary rules, a pattern with a non-standard delimiter, or tracing
 * through a debug observer.
 *
 * @example
 * ```typescript
 * import { createConverter, Case, LOWER_UPPER } from 'caseweave';
 *
 * const dotted = createConverter({ from: Case.CAMEL, pattern: 'lowercase', delimiter: '.' });
 * dotted.convert('userProfileId');  // 'user.profile.id'
 *
 * const path = createConverter()
 *     .withBoundaries([LOWER_UPPER])
 *     .to(Case.KEBAB)
 *     .withDelimiter('/');
 * path.convert('adminUsersList');  // 'admin/users/list'
 * ```
 *
 * @module
 */
import { CASE_SPECS, type Case, type Pattern } from '../domain/Case.js';
import { boundariesOf, type Boundary } from '../domain/Boundary.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { splitWords } from '../words/WordSplitter.js';
import { applyPattern } from '../words/PatternRenderer.js';
import { resolveConfig, type ConverterConfig, type ConverterOptions } from './ConverterConfig.js';

function sameBoundary(a: Boundary, b: Boundary): boolean {
    if (a.kind === 'delimiter' && b.kind === 'delimiter') return a.chars === b.chars;
    return a.kind === b.kind;
}

/**
 * Immutable converter. Every `with*` / `from` / `to` call returns a new
 * instance; `convert()` never throws.
 */
export class Converter {
    private constructor(public readonly config: ConverterConfig) {}

    /** @internal */
    static fromConfig(config: ConverterConfig): Converter {
        return new Converter(Object.freeze({ ...config }));
    }

    /** Split `text` with the configured boundaries and render the words. */
    convert(text: string): string {
        const { boundaries, pattern, delimiter, debug } = this.config;
        if (!debug) return render(splitWords(text, boundaries), pattern, delimiter);

        let start = performance.now();
        const words = splitWords(text, boundaries);
        debug({ type: 'split', input: text, words, durationMs: performance.now() - start, timestamp: Date.now() });

        start = performance.now();
        const output = render(words, pattern, delimiter);
        debug({ type: 'render', words, pattern, delimiter, output, durationMs: performance.now() - start, timestamp: Date.now() });
        return output;
    }

    /** Use the boundaries of a source convention. */
    from(source: Case): Converter {
        return this._with({ boundaries: boundariesOf(source) });
    }

    /** Use the pattern and delimiter of a target convention. */
    to(target: Case): Converter {
        const { pattern, delimiter } = CASE_SPECS[target];
        return this._with({ pattern, delimiter });
    }

    withBoundaries(boundaries: readonly Boundary[]): Converter {
        return this._with({ boundaries: Object.freeze([...boundaries]) });
    }

    /** Enable one more rule. Already-enabled rules are not duplicated. */
    addBoundary(boundary: Boundary): Converter {
        if (this.config.boundaries.some(b => sameBoundary(b, boundary))) return this;
        return this.withBoundaries([...this.config.boundaries, boundary]);
    }

    removeBoundary(boundary: Boundary): Converter {
        return this.withBoundaries(this.config.boundaries.filter(b => !sameBoundary(b, boundary)));
    }

    /** `undefined` keeps words verbatim. */
    withPattern(pattern: Pattern | undefined): Converter {
        return this._with({ pattern });
    }

    withDelimiter(delimiter: string): Converter {
        return this._with({ delimiter });
    }

    withDebug(debug: DebugObserverFn | undefined): Converter {
        return this._with({ debug });
    }

    private _with(patch: Partial<ConverterConfig>): Converter {
        return Converter.fromConfig({ ...this.config, ...patch });
    }
}

function render(words: readonly string[], pattern: Pattern | undefined, delimiter: string): string {
    return (pattern !== undefined ? applyPattern(words, pattern) : words).join(delimiter);
}

/**
 * Build a converter from options.
 *
 * @throws {ConverterConfigError} When an option has the wrong shape
 */
export function createConverter(options: ConverterOptions = {}): Converter {
    return Converter.fromConfig(resolveConfig(options));
}
