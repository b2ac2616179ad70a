/**
 * SentenceCoder - one parse in, event triples out
 *
 * normalize → elide clauses → resolve entities → match verbs → finish.
 * Any stage failure skips the sentence and is reported on the bus. Callers
 * that look at the prepared tokens first (discard checks) use
 * `prepareSentence` and `codeTokens` instead of `code`.
 */

import type { CoderConfig } from '@/lib/config/coderConfig';
import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { ok, type CodingFailure, type CodingResult } from '@/lib/core/errors';
import type { CoderDictionaries } from '@/lib/dictionaries/types';
import { elideClauses } from '@/lib/treebank/ClauseElision';
import { normalizeTree } from '@/lib/treebank/TreeNormalizer';
import type { Token } from '@/lib/treebank/tokens';
import { CodingContext } from './CodingContext';
import { resolveEntities } from './EntityResolver';
import { finalizeEvents } from './EventAssembler';
import { codeVerbs } from './VerbPatternEngine';
import type { CodedEvent } from './types';

export interface SentenceInput {
    id: string;
    parse: string;
    ordinalDate: number;
}

export interface SentenceCoding {
    events: CodedEvent[];
    /** Token sequence after entity resolution */
    tokens: Token[];
}

export class SentenceCoder {
    constructor(
        private dictionaries: CoderDictionaries,
        private config: CoderConfig,
        private bus: CoderEventBus = coderEventBus
    ) { }

    /** Normalized and clause-elided tokens, before any lookup */
    prepare(parse: string, sentenceId?: string): CodingResult<Token[]> {
        const normalized = normalizeTree(parse, sentenceId);
        if (!normalized.success) return normalized;
        return elideClauses(normalized.value, this.config, sentenceId);
    }

    /** `prepare`, reporting a failure the way `code` does */
    prepareSentence(sentence: SentenceInput): CodingResult<Token[]> {
        const prepared = this.prepare(sentence.parse, sentence.id);
        if (!prepared.success) this.reportFailure(sentence.id, prepared.failure);
        return prepared;
    }

    code(sentence: SentenceInput): CodingResult<SentenceCoding> {
        const prepared = this.prepareSentence(sentence);
        if (!prepared.success) return prepared;
        return this.codeTokens(sentence, prepared.value);
    }

    codeTokens(sentence: SentenceInput, tokens: Token[]): CodingResult<SentenceCoding> {
        const result = this.run(sentence, tokens);
        if (!result.success) {
            this.reportFailure(sentence.id, result.failure);
            return result;
        }
        if (result.value.events.length > 0) {
            this.bus.emit('events-coded', { sentenceId: sentence.id, events: result.value.events });
        }
        return result;
    }

    private reportFailure(sentenceId: string, failure: CodingFailure): void {
        console.warn(`[SentenceCoder] ${failure.tag} in ${sentenceId}: ${failure.message}`);
        this.bus.emit('sentence-skipped', failure);
    }

    private run(sentence: SentenceInput, tokens: Token[]): CodingResult<SentenceCoding> {
        const ctx = new CodingContext(sentence.id, sentence.ordinalDate, tokens, this.dictionaries, this.config);

        const resolved = resolveEntities(ctx);
        if (!resolved.success) return resolved;
        const coded = codeVerbs(ctx);
        if (!coded.success) return coded;

        return ok({ events: finalizeEvents(ctx.events, this.config), tokens: ctx.tokens });
    }
}
