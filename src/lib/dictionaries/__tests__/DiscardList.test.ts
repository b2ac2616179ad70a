import { describe, it, expect } from 'vitest';
import { checkDiscards, compileDiscardList } from '../DiscardList';

describe('DiscardList', () => {
    const list = compileDiscardList('SOCCER\n+CROSSWORD # puzzle\nGOAL_\n');

    it('should compile story and whole-word flags', () => {
        expect(list.phrases).toEqual([
            { phrase: 'SOCCER', story: false, wholeWord: false },
            { phrase: 'CROSSWORD', story: true, wholeWord: false },
            { phrase: 'GOAL', story: false, wholeWord: true },
        ]);
    });

    it('should prefer a story discard over a sentence discard', () => {
        expect(checkDiscards('The soccer crossword was hard', list)).toEqual({ kind: 'story', phrase: 'CROSSWORD' });
    });

    it('should match sentence phrases case-insensitively', () => {
        expect(checkDiscards('A soccer match', list)).toEqual({ kind: 'sentence', phrase: 'SOCCER' });
    });

    it('should require a word ending for underscore phrases', () => {
        expect(checkDiscards('Goals were scored', list)).toEqual({ kind: 'none' });
        expect(checkDiscards('A late goal.', list)).toEqual({ kind: 'sentence', phrase: 'GOAL' });
    });

    it('should only match phrases at the start of a word', () => {
        expect(checkDiscards('Minisoccer is new', list)).toEqual({ kind: 'none' });
    });

    it('should report nothing without a list', () => {
        expect(checkDiscards('A soccer match', undefined)).toEqual({ kind: 'none' });
    });
});
