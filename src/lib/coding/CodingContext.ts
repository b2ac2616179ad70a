import type { CoderConfig } from '@/lib/config/coderConfig';
import type { CoderDictionaries } from '@/lib/dictionaries/types';
import type { Token } from '@/lib/treebank/tokens';
import type { CodedEvent } from './types';

/**
 * Everything one sentence's coding touches. Created per sentence and
 * discarded afterwards; the dictionaries are shared read-only.
 */
export class CodingContext {
    readonly events: CodedEvent[] = [];

    constructor(
        readonly sentenceId: string,
        readonly ordinalDate: number,
        public tokens: Token[],
        readonly dictionaries: CoderDictionaries,
        readonly config: CoderConfig
    ) { }

    /** Next unused compound index in the current tokens */
    nextCompoundIndex(): number {
        let max = 0;
        for (const token of this.tokens) {
            if (token.kind === 'compound-open' && token.index > max) max = token.index;
        }
        return max + 1;
    }
}
