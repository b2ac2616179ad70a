import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CoderEventBus } from '../CoderEventBus';
import { CoderError, fail, ok } from '../errors';

describe('CoderEventBus', () => {
    let bus: CoderEventBus;

    beforeEach(() => {
        bus = new CoderEventBus();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should deliver payloads to subscribed handlers', () => {
        const handler = vi.fn();
        bus.on('sentence-discarded', handler);

        bus.emit('sentence-discarded', { sentenceId: 'S-1', phrase: 'SOCCER' });

        expect(handler).toHaveBeenCalledTimes(1);
        expect(handler).toHaveBeenCalledWith({ sentenceId: 'S-1', phrase: 'SOCCER' });
    });

    it('should stop delivering after unsubscribe', () => {
        const handler = vi.fn();
        const unsubscribe = bus.on('dictionary-warning', handler);

        unsubscribe();
        bus.emit('dictionary-warning', { dictionary: 'verb', line: 3, message: 'bad' });

        expect(handler).not.toHaveBeenCalled();
    });

    it('should keep calling other handlers when one throws', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const failing = vi.fn(() => {
            throw new Error('listener failed');
        });
        const healthy = vi.fn();
        bus.on('sentence-skipped', failing);
        bus.on('sentence-skipped', healthy);

        bus.emit('sentence-skipped', { tag: 'dateline', message: 'x', sentenceId: 'S-2' });

        expect(healthy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy.mock.calls[0][0]).toBe('[CoderEventBus] Error in sentence-skipped handler:');
    });

    it('should drop every listener on clear', () => {
        const handler = vi.fn();
        bus.on('events-coded', handler);

        bus.clear();
        bus.emit('events-coded', { sentenceId: 'S-3', events: [] });

        expect(handler).not.toHaveBeenCalled();
    });
});

describe('errors', () => {
    it('should build success and failure results', () => {
        expect(ok(3)).toEqual({ success: true, value: 3 });
        expect(fail('comma_balance', 'unbalanced', 'S-4')).toEqual({
            success: false,
            failure: { tag: 'comma_balance', message: 'unbalanced', sentenceId: 'S-4' },
        });
    });

    it('should carry a code and context on CoderError', () => {
        const error = new CoderError('missing', 'dictionary_missing', { path: 'verbs.txt' });

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('CoderError');
        expect(error.code).toBe('dictionary_missing');
        expect(error.context).toEqual({ path: 'verbs.txt' });
    });
});
