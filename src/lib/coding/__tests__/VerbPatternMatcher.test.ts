import { describe, it, expect } from 'vitest';
import { compileLowerPattern, compileUpperPattern } from '@/lib/dictionaries/VerbDictionary';
import { matchPatternSide, matchSynset } from '../VerbPatternMatcher';
import type { ContextItem, Locators } from '../types';

const synsets = new Map<string, string[][]>([
    ['&WEAPON', [['MISSILE'], ['SURFACE', 'TO', 'AIR']]],
]);
const verbs = { synsets };

function words(...texts: string[]): ContextItem[] {
    return texts.map((text, i): ContextItem => ({ kind: 'word', tokenIndex: 20 + i, text }));
}

function emptyLocators(): Locators {
    return { source: null, target: null };
}

// Upper side of `(NE FRA FRANCE ~NE` in front of the verb, nearest first
const upperFrance: ContextItem[] = [
    { kind: 'entity-close', tokenIndex: 4 },
    { kind: 'word', tokenIndex: 3, text: 'FRANCE' },
    { kind: 'entity-open', tokenIndex: 2, code: 'FRA' },
];

// Lower side of `HARD AGAINST (NE GMY GERMANY ~NE`
const lowerAgainst: ContextItem[] = [
    { kind: 'word', tokenIndex: 9, text: 'HARD' },
    { kind: 'word', tokenIndex: 10, text: 'AGAINST' },
    { kind: 'entity-open', tokenIndex: 11, code: 'GMY' },
    { kind: 'word', tokenIndex: 12, text: 'GERMANY' },
    { kind: 'entity-close', tokenIndex: 13 },
];

describe('VerbPatternMatcher', () => {
    describe('matchSynset', () => {
        it('should cover every word of a phrase member', () => {
            expect(matchSynset(synsets.get('&WEAPON') ?? [], words('SURFACE', 'TO', 'AIR'), 0, 'lower')).toBe(3);
        });

        it('should read phrase members backwards in the upper sequence', () => {
            expect(matchSynset(synsets.get('&WEAPON') ?? [], words('AIR', 'TO', 'SURFACE'), 0, 'upper')).toBe(3);
            expect(matchSynset(synsets.get('&WEAPON') ?? [], words('SURFACE', 'TO', 'AIR'), 0, 'upper')).toBe(0);
        });
    });

    describe('matchPatternSide', () => {
        it('should match an empty side', () => {
            expect(matchPatternSide([], [], 'lower', verbs, emptyLocators())).toEqual({ success: true, value: true });
        });

        it('should place the source on the entity the walk is inside', () => {
            const locators = emptyLocators();

            const result = matchPatternSide(compileUpperPattern('$ '), upperFrance, 'upper', verbs, locators);

            expect(result).toEqual({ success: true, value: true });
            expect(locators.source).toEqual({ side: 'upper', position: 2, tokenIndex: 2 });
            expect(locators.target).toBeNull();
        });

        it('should skip words across a blank connector', () => {
            const locators = emptyLocators();

            const result = matchPatternSide(compileLowerPattern(' AGAINST + '), lowerAgainst, 'lower', verbs, locators);

            expect(result).toEqual({ success: true, value: true });
            expect(locators.target).toEqual({ side: 'lower', position: 2, tokenIndex: 11 });
        });

        it('should fail on a gap across an underscore connector', () => {
            const result = matchPatternSide(compileLowerPattern('_AGAINST + '), lowerAgainst, 'lower', verbs, emptyLocators());

            expect(result).toEqual({ success: true, value: false });
        });

        it('should not place an actor outside an entity when adjacency is required', () => {
            const steps = compileLowerPattern('_+');

            expect(matchPatternSide(steps, words('WITH'), 'lower', verbs, emptyLocators())).toEqual({
                success: true,
                value: false,
            });
        });

        it('should match a synonym set member', () => {
            const steps = compileLowerPattern(' &WEAPON');

            expect(matchPatternSide(steps, words('THE', 'MISSILE'), 'lower', verbs, emptyLocators())).toEqual({
                success: true,
                value: true,
            });
        });

        it('should skip over a whole entity', () => {
            const lower: ContextItem[] = [
                { kind: 'entity-open', tokenIndex: 9, code: 'ITA' },
                { kind: 'word', tokenIndex: 10, text: 'ITALY' },
                { kind: 'entity-close', tokenIndex: 11 },
                { kind: 'entity-open', tokenIndex: 12, code: 'GMY' },
                { kind: 'word', tokenIndex: 13, text: 'GERMANY' },
                { kind: 'entity-close', tokenIndex: 14 },
            ];
            const locators = emptyLocators();

            const result = matchPatternSide(compileLowerPattern(' ^ + '), lower, 'lower', verbs, locators);

            expect(result).toEqual({ success: true, value: true });
            expect(locators.target).toEqual({ side: 'lower', position: 3, tokenIndex: 12 });
        });

        it('should place both actors on a compound', () => {
            const upper: ContextItem[] = [
                { kind: 'compound-close', tokenIndex: 9 },
                { kind: 'entity-close', tokenIndex: 8 },
                { kind: 'word', tokenIndex: 7, text: 'GERMANY' },
                { kind: 'entity-open', tokenIndex: 6, code: 'GMY' },
                { kind: 'entity-close', tokenIndex: 5 },
                { kind: 'word', tokenIndex: 4, text: 'FRANCE' },
                { kind: 'entity-open', tokenIndex: 3, code: 'FRA' },
                { kind: 'compound-open', tokenIndex: 2 },
            ];
            const locators = emptyLocators();

            const result = matchPatternSide(compileUpperPattern('% '), upper, 'upper', verbs, locators);

            expect(result).toEqual({ success: true, value: true });
            expect(locators.source).toEqual({ side: 'upper', position: 7, tokenIndex: 2 });
            expect(locators.target).toEqual({ side: 'upper', position: 7, tokenIndex: 2 });
        });
    });
});
