import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugObserverFn } from '../../src/observability/DebugObserver.js';

describe('createDebugObserver()', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler as is', () => {
        const handler: DebugObserverFn = vi.fn();
        expect(createDebugObserver(handler)).toBe(handler);
    });

    it('should log split events', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const debug = createDebugObserver();

        debug({ type: 'split', input: 'fooBar', words: ['foo', 'Bar'], durationMs: 0.04, timestamp: 0 });
        debug({ type: 'split', input: 'foo', words: ['foo'], durationMs: 2, timestamp: 0 });

        expect(spy).toHaveBeenNthCalledWith(1, '[caseweave] split     "fooBar" → 2 words 0.0ms');
        expect(spy).toHaveBeenNthCalledWith(2, '[caseweave] split     "foo" → 1 word 2.0ms');
    });

    it('should log render events', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const debug = createDebugObserver();

        debug({
            type: 'render', words: ['foo', 'Bar'], pattern: 'lowercase', delimiter: '_',
            output: 'foo_bar', durationMs: 2, timestamp: 0,
        });
        debug({
            type: 'render', words: ['foo', 'Bar'], pattern: undefined, delimiter: '',
            output: 'fooBar', durationMs: 0, timestamp: 0,
        });

        expect(spy).toHaveBeenNthCalledWith(1, '[caseweave] render    lowercase "_" → "foo_bar" 2.0ms');
        expect(spy).toHaveBeenNthCalledWith(2, '[caseweave] render    verbatim "" → "fooBar" 0.0ms');
    });
});
