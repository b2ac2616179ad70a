/**
 * StoryCoder - batch driver over stories
 *
 * Sentences are coded in order, up to `maxSentencesPerStory`. A sentence
 * discard phrase skips that sentence; a story discard phrase abandons the
 * rest of the story. Discards are checked once the parse has normalized.
 * A story with an unreadable date has every sentence skipped.
 */

import { DEFAULT_CODER_CONFIG, type CoderConfig } from '@/lib/config/coderConfig';
import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { CoderError, type CodingFailure } from '@/lib/core/errors';
import { checkDiscards } from '@/lib/dictionaries/DiscardList';
import { findIssues } from '@/lib/dictionaries/IssueList';
import { toOrdinalDate } from '@/lib/dictionaries/ordinalDate';
import type { CoderDictionaries } from '@/lib/dictionaries/types';
import { SentenceCoder } from './SentenceCoder';
import type { CodedEvent } from './types';

// ==================== TYPES ====================

export interface StorySentence {
    id: string;
    text: string;
    parse?: string;
}

export interface Story {
    id: string;
    /** YYYYMMDD or YYMMDD */
    date: string;
    source?: string;
    sentences: StorySentence[];
}

export type SentenceOutcome =
    | { status: 'coded'; sentenceId: string; events: CodedEvent[]; issues: Array<[string, number]> }
    | { status: 'skipped'; sentenceId: string; failure: CodingFailure }
    | { status: 'sentence-discard'; sentenceId: string; phrase: string }
    | { status: 'story-discard'; sentenceId: string; phrase: string }
    | { status: 'no-parse'; sentenceId: string };

export interface StoryResult {
    storyId: string;
    discarded: boolean;
    sentences: SentenceOutcome[];
}

export interface CodingSummary {
    storiesRead: number;
    sentencesCoded: number;
    eventsGenerated: number;
    sentenceDiscards: number;
    storyDiscards: number;
    sentencesWithoutEvents: number;
    sentencesSkipped: number;
}

export function emptySummary(): CodingSummary {
    return {
        storiesRead: 0,
        sentencesCoded: 0,
        eventsGenerated: 0,
        sentenceDiscards: 0,
        storyDiscards: 0,
        sentencesWithoutEvents: 0,
        sentencesSkipped: 0,
    };
}

// ==================== CODER ====================

export class StoryCoder {
    private sentenceCoder: SentenceCoder;

    constructor(
        private dictionaries: CoderDictionaries,
        private config: CoderConfig = DEFAULT_CODER_CONFIG,
        private bus: CoderEventBus = coderEventBus
    ) {
        this.sentenceCoder = new SentenceCoder(dictionaries, config, bus);
    }

    codeStory(story: Story, summary: CodingSummary = emptySummary()): StoryResult {
        const result: StoryResult = { storyId: story.id, discarded: false, sentences: [] };
        summary.storiesRead++;

        const sentences = story.sentences.slice(0, this.config.maxSentencesPerStory);
        if (sentences.length < story.sentences.length) {
            console.info(
                `[StoryCoder] ${story.id}: coding the first ${sentences.length} of ${story.sentences.length} sentences`
            );
        }

        const ordinalDate = this.readDate(story);
        if (ordinalDate === null) {
            const message = `Story ${story.id} has no usable date`;
            for (const sentence of sentences) {
                const failure: CodingFailure = { tag: 'story_date', message, sentenceId: sentence.id };
                result.sentences.push({ status: 'skipped', sentenceId: sentence.id, failure });
            }
            summary.sentencesSkipped += sentences.length;
            return result;
        }

        for (const sentence of sentences) {
            const outcome = this.codeSentence(story, sentence, ordinalDate);
            result.sentences.push(outcome);

            switch (outcome.status) {
                case 'coded':
                    summary.sentencesCoded++;
                    summary.eventsGenerated += outcome.events.length;
                    if (outcome.events.length === 0) summary.sentencesWithoutEvents++;
                    break;
                case 'skipped':
                    summary.sentencesSkipped++;
                    if (this.config.stopOnError) {
                        throw new CoderError(
                            `Stopped on ${outcome.failure.tag} in ${sentence.id}`,
                            'stopped_on_error',
                            { failure: outcome.failure }
                        );
                    }
                    break;
                case 'sentence-discard':
                    summary.sentenceDiscards++;
                    break;
                case 'story-discard':
                    summary.storyDiscards++;
                    result.discarded = true;
                    break;
                case 'no-parse':
                    break;
            }
            if (result.discarded) break;
        }
        return result;
    }

    codeStories(stories: Story[]): { stories: StoryResult[]; summary: CodingSummary } {
        const summary = emptySummary();
        const results = stories.map(story => this.codeStory(story, summary));

        console.info('[StoryCoder] Summary:');
        console.info(`[StoryCoder]   Stories read: ${summary.storiesRead}`);
        console.info(`[StoryCoder]   Sentences coded: ${summary.sentencesCoded}`);
        console.info(`[StoryCoder]   Events generated: ${summary.eventsGenerated}`);
        console.info(`[StoryCoder]   Discards: ${summary.sentenceDiscards} sentences, ${summary.storyDiscards} stories`);
        console.info(`[StoryCoder]   Sentences without events: ${summary.sentencesWithoutEvents}`);
        console.info(`[StoryCoder]   Sentences skipped: ${summary.sentencesSkipped}`);

        return { stories: results, summary };
    }

    /** Ordinal date of the story, or null once an unreadable date is reported */
    private readDate(story: Story): number | null {
        try {
            return toOrdinalDate(story.date);
        } catch (error) {
            if (!(error instanceof CoderError) || error.code !== 'invalid_date' || this.config.stopOnError) {
                throw error;
            }
            console.warn(`[StoryCoder] ${story.id} skipped: ${error.message}`);
            this.bus.emit('story-skipped', { storyId: story.id, message: error.message });
            return null;
        }
    }

    private codeSentence(story: Story, sentence: StorySentence, ordinalDate: number): SentenceOutcome {
        if (!sentence.parse) {
            console.info(`[StoryCoder] No parse for ${sentence.id}; skipped`);
            return { status: 'no-parse', sentenceId: sentence.id };
        }

        const input = { id: sentence.id, parse: sentence.parse, ordinalDate };
        const prepared = this.sentenceCoder.prepareSentence(input);
        if (!prepared.success) {
            return { status: 'skipped', sentenceId: sentence.id, failure: prepared.failure };
        }

        const discard = checkDiscards(sentence.text, this.dictionaries.discards);
        if (discard.kind === 'story') {
            console.info(`[StoryCoder] Story discard in ${sentence.id}: ${discard.phrase}`);
            this.bus.emit('story-discarded', { storyId: story.id, sentenceId: sentence.id, phrase: discard.phrase });
            return { status: 'story-discard', sentenceId: sentence.id, phrase: discard.phrase };
        }
        if (discard.kind === 'sentence') {
            console.info(`[StoryCoder] Sentence discard in ${sentence.id}: ${discard.phrase}`);
            this.bus.emit('sentence-discarded', { sentenceId: sentence.id, phrase: discard.phrase });
            return { status: 'sentence-discard', sentenceId: sentence.id, phrase: discard.phrase };
        }

        const coded = this.sentenceCoder.codeTokens(input, prepared.value);
        if (!coded.success) {
            return { status: 'skipped', sentenceId: sentence.id, failure: coded.failure };
        }
        const events = coded.value.events;
        const issues = events.length > 0 ? findIssues(sentence.text, this.dictionaries.issues) : [];
        return { status: 'coded', sentenceId: sentence.id, events, issues };
    }
}
