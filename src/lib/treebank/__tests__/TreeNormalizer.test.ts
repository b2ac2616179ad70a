import { describe, it, expect } from 'vitest';
import { normalizeTree } from '../TreeNormalizer';
import { isBalanced, renderTokens } from '../tokens';

function render(parse: string): string {
    const result = normalizeTree(parse, 'T-1');
    if (!result.success) throw new Error(`${result.failure.tag}: ${result.failure.message}`);
    expect(isBalanced(result.value)).toBe(true);
    return renderTokens(result.value);
}

describe('TreeNormalizer', () => {
    it('should turn simple noun phrases into entities and index verb phrases', () => {
        const parse = '(ROOT (S (NP (NNP FRANCE)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (NE --- FRANCE ~NE (VP1 (VBD ATTACKED ~VBD (NE --- GERMANY ~NE ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should drop the possessive marker from an entity', () => {
        const parse = "(ROOT (S (NP (NP (NNP FRANCE) (POS 'S)) (NN PRESIDENT)) (VP (VBD RESIGNED)) (. .)))";

        expect(render(parse)).toBe(
            '(ROOT (S (NE --- FRANCE PRESIDENT ~NE (VP1 (VBD RESIGNED ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should fold a prepositional phrase into one entity', () => {
        const parse = '(ROOT (S (NP (NP (NNS LEADERS)) (PP (IN OF) (NP (NNP FRANCE)))) (VP (VBD MET)) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (NE --- LEADERS OF FRANCE ~NE (VP1 (VBD MET ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should keep an indexed noun phrase when the object has its own preposition', () => {
        const parse =
            '(ROOT (S (NP (NP (NNS LEADERS)) (PP (IN OF) (NP (NP (NNS PARTS)) (PP (IN OF) (NP (NNP FRANCE)))))) ' +
            '(VP (VBD MET)) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (NP1 (NE --- LEADERS ~NE (PP (IN OF ~IN (NE --- PARTS OF FRANCE ~NE ~PP ~NP1 ' +
            '(VP1 (VBD MET ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should split a coordinated noun phrase into a compound', () => {
        const parse = '(ROOT (S (NP (NNP FRANCE) (CC AND) (NNP GERMANY)) (VP (VBD MET)) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (NEC1 (NE --- FRANCE ~NE (NE --- GERMANY ~NE ~NEC1 (VP1 (VBD MET ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should copy leading adjectives onto each compound head', () => {
        const parse = '(ROOT (S (NP (JJ BRITISH) (NNS TROOPS) (CC AND) (NNS POLICE)) (VP (VBD LEFT)) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (NEC1 (NE --- BRITISH TROOPS ~NE (NE --- BRITISH POLICE ~NE ~NEC1 ' +
            '(VP1 (VBD LEFT ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should treat a coordination of clauses as a plain conjunction', () => {
        const parse =
            '(ROOT (S (S (NP (NNP FRANCE)) (VP (VBD SLEPT))) (CC AND) (S (NP (NNP ITALY)) (VP (VBD WOKE))) (. .)))';

        expect(render(parse)).toBe(
            '(ROOT (S (S (NE --- FRANCE ~NE (VP1 (VBD SLEPT ~VBD ~VP1 ~S (CCP AND ~CCP ' +
            '(S (NE --- ITALY ~NE (VP2 (VBD WOKE ~VBD ~VP2 ~S (. . ~. ~S ~ROOT'
        );
    });

    it('should keep a compound nested inside an entity as marked members', () => {
        const parse =
            "(ROOT (S (NP (NP (NNP FRANCE) (CC AND) (NNP GERMANY)) (POS 'S) (NNS LEADERS)) (VP (VBD MET)) (. .)))";

        expect(render(parse)).toBe(
            '(ROOT (S (NE --- (NEC1 (NNP FRANCE ~NNP (NNP GERMANY ~NNP ~NEC1 LEADERS ~NE ' +
            '(VP1 (VBD MET ~VBD ~VP1 (. . ~. ~S ~ROOT'
        );
    });

    it('should reject datelines', () => {
        const result = normalizeTree("(ROOT (NP (NP (NNP CAIRO) (CC AND) (NNP GIZA)) (POS 'S) (NN MARKETS)))", 'T-2');

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.failure.tag).toBe('dateline');
        expect(result.failure.sentenceId).toBe('T-2');
    });

    it('should pass through parse failures', () => {
        const result = normalizeTree('(ROOT (S (NP (NNP FRANCE)))))');

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.failure.tag).toBe('bad_input_parse');
    });
});
