import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildTestDictionaries } from '@/test/dictionaries';
import { DEFAULT_CODER_CONFIG } from '@/lib/config/coderConfig';
import { CoderEventBus } from '@/lib/core/CoderEventBus';
import type { CodingFailure } from '@/lib/core/errors';
import { renderTokens } from '@/lib/treebank/tokens';
import { SentenceCoder } from '../SentenceCoder';

const SEP_26_2013 = 150749;

describe('SentenceCoder', () => {
    let bus: CoderEventBus;
    let coder: SentenceCoder;

    beforeEach(() => {
        bus = new CoderEventBus();
        coder = new SentenceCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should code a sentence and publish its events', () => {
        const published = vi.fn();
        bus.on('events-coded', published);

        const result = coder.code({
            id: 'S-1',
            parse: '(ROOT (S (NP (NNP FRANCE)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (. .)))',
            ordinalDate: SEP_26_2013,
        });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.events).toEqual([{ source: 'FRA', target: 'GMY', eventCode: '190' }]);
        expect(renderTokens(result.value.tokens)).toBe(
            '(ROOT (S (NE FRA FRANCE ~NE (VP1 (VBD ATTACKED ~VBD (NE GMY GERMANY ~NE ~VP1 (. . ~. ~S ~ROOT'
        );
        expect(published).toHaveBeenCalledWith({
            sentenceId: 'S-1',
            events: [{ source: 'FRA', target: 'GMY', eventCode: '190' }],
        });
    });

    it('should drop an event with an unresolved actor when dyads are required', () => {
        const result = coder.code({
            id: 'S-2',
            parse: '(ROOT (S (NP (NNS TROOPS)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (. .)))',
            ordinalDate: SEP_26_2013,
        });

        expect(result).toMatchObject({ success: true, value: { events: [] } });
    });

    it('should keep an unresolved actor when dyads are optional', () => {
        const lenient = new SentenceCoder(buildTestDictionaries(bus), { ...DEFAULT_CODER_CONFIG, requireDyad: false }, bus);

        const result = lenient.code({
            id: 'S-3',
            parse: '(ROOT (S (NP (NNS TROOPS)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (. .)))',
            ordinalDate: SEP_26_2013,
        });

        expect(result).toMatchObject({
            success: true,
            value: { events: [{ source: '---', target: 'GMY', eventCode: '190' }] },
        });
    });

    it('should skip a dateline and report it', () => {
        const skipped: CodingFailure[] = [];
        bus.on('sentence-skipped', failure => skipped.push(failure));

        const result = coder.code({
            id: 'S-4',
            parse: "(ROOT (NP (NP (NNP CAIRO) (CC AND) (NNP GIZA)) (POS 'S) (NN MARKETS)))",
            ordinalDate: SEP_26_2013,
        });

        expect(result.success).toBe(false);
        expect(skipped).toEqual([
            { tag: 'dateline', message: 'Dateline pattern found in token sequence', sentenceId: 'S-4' },
        ]);
        expect(console.warn).toHaveBeenCalledWith(
            '[SentenceCoder] dateline in S-4: Dateline pattern found in token sequence'
        );
    });

    it('should elide clauses before coding', () => {
        const eliding = new SentenceCoder(buildTestDictionaries(bus), { ...DEFAULT_CODER_CONFIG, commaEMax: 4 }, bus);

        const prepared = eliding.prepare(
            '(ROOT (S (NP (NNP FRANCE)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (, ,) ' +
            '(S (VP (VBG CITING) (NP (NNS REASONS)))) (. .)))',
            'S-5'
        );

        expect(prepared.success).toBe(true);
        if (!prepared.success) return;
        expect(renderTokens(prepared.value)).toBe(
            '(ROOT (S (NE --- FRANCE ~NE (VP1 (VBD ATTACKED ~VBD (NE --- GERMANY ~NE ~VP1 (. . ~. ~S ~ROOT'
        );
    });
});
