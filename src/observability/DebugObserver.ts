/**
 * DebugObserver — opt-in tracing for converters.
 *
 * A {@link Converter} built with a `debug` observer emits one `split`
 * and one `render` event per conversion. Without an observer nothing is
 * measured or logged. The free functions (`toCase`, `fromCase`) are
 * never instrumented.
 *
 * @example
 * ```typescript
 * import { createConverter, createDebugObserver, Case } from 'caseweave';
 *
 * // Default: console.debug
 * const converter = createConverter({ to: Case.SNAKE, debug: createDebugObserver() });
 *
 * // Custom handler
 * const converter = createConverter({
 *     to: Case.SNAKE,
 *     debug: createDebugObserver((event) => metrics.track(event.type, event)),
 * });
 * ```
 *
 * @module
 */
import { type Pattern } from '../domain/Case.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after the input was cut into words. */
export interface SplitEvent {
    readonly type: 'split';
    readonly input: string;
    readonly words: readonly string[];
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after the words were cased and joined. */
export interface RenderEvent {
    readonly type: 'render';
    readonly words: readonly string[];
    /** `undefined` when the converter keeps words verbatim */
    readonly pattern: Pattern | undefined;
    readonly delimiter: string;
    readonly output: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

export type DebugEvent = SplitEvent | RenderEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output:
 *
 * ```
 * [caseweave] split     "XMLHttpRequest" → 3 words 0.1ms
 * [caseweave] render    lowercase "_" → "xml_http_request" 0.0ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[caseweave]';

        switch (event.type) {
            case 'split': {
                const noun = event.words.length === 1 ? 'word' : 'words';
                console.debug(`${prefix} split     ${JSON.stringify(event.input)} → ${event.words.length} ${noun} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'render':
                console.debug(`${prefix} render    ${event.pattern ?? 'verbatim'} ${JSON.stringify(event.delimiter)} → ${JSON.stringify(event.output)} ${event.durationMs.toFixed(1)}ms`);
                break;
        }
    };
}
