import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildTestDictionaries } from '@/test/dictionaries';
import { DEFAULT_CODER_CONFIG } from '@/lib/config/coderConfig';
import { CoderEventBus } from '@/lib/core/CoderEventBus';
import { CoderError } from '@/lib/core/errors';
import { StoryCoder, type Story } from '../StoryCoder';

const ATTACK = '(ROOT (S (NP (NNP FRANCE)) (VP (VBD ATTACKED) (NP (NNP GERMANY))) (. .)))';
const SLEEP = '(ROOT (S (NP (NNP ITALY)) (VP (VBD SLEPT)) (. .)))';

const BAD_DATE_SENTENCE = { id: 'ST-5-1', text: 'France attacked Germany.', parse: ATTACK };

const story: Story = {
    id: 'ST-1',
    date: '20130926',
    sentences: [
        { id: 'ST-1-1', text: 'France attacked Germany over nuclear weapon sites.', parse: ATTACK },
        { id: 'ST-1-2', text: 'Soccer fans met in France.', parse: SLEEP },
        { id: 'ST-1-3', text: 'No parse was made for this one.' },
        { id: 'ST-1-4', text: 'Italy slept.', parse: SLEEP },
        { id: 'ST-1-5', text: 'The crossword and soccer page.', parse: SLEEP },
        { id: 'ST-1-6', text: 'France attacked Germany.', parse: ATTACK },
    ],
};

describe('StoryCoder', () => {
    let bus: CoderEventBus;

    beforeEach(() => {
        bus = new CoderEventBus();
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should code, discard and skip sentences in order', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);

        const result = coder.codeStory(story);

        expect(result.discarded).toBe(true);
        expect(result.sentences).toEqual([
            {
                status: 'coded',
                sentenceId: 'ST-1-1',
                events: [{ source: 'FRA', target: 'GMY', eventCode: '190' }],
                issues: [['NUC', 1]],
            },
            { status: 'sentence-discard', sentenceId: 'ST-1-2', phrase: 'SOCCER' },
            { status: 'no-parse', sentenceId: 'ST-1-3' },
            { status: 'coded', sentenceId: 'ST-1-4', events: [], issues: [] },
            { status: 'story-discard', sentenceId: 'ST-1-5', phrase: 'CROSSWORD' },
        ]);
    });

    it('should publish discards on the bus', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        const sentenceDiscards = vi.fn();
        const storyDiscards = vi.fn();
        bus.on('sentence-discarded', sentenceDiscards);
        bus.on('story-discarded', storyDiscards);

        coder.codeStory(story);

        expect(sentenceDiscards).toHaveBeenCalledWith({ sentenceId: 'ST-1-2', phrase: 'SOCCER' });
        expect(storyDiscards).toHaveBeenCalledWith({ storyId: 'ST-1', sentenceId: 'ST-1-5', phrase: 'CROSSWORD' });
    });

    it('should summarize a batch', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        const second: Story = {
            id: 'ST-2',
            date: '130927',
            sentences: [{ id: 'ST-2-1', text: 'Broken.', parse: '(ROOT (S (NP (NNP FRANCE))' }],
        };

        const { stories, summary } = coder.codeStories([story, second]);

        expect(stories.map(result => result.storyId)).toEqual(['ST-1', 'ST-2']);
        expect(summary).toEqual({
            storiesRead: 2,
            sentencesCoded: 2,
            eventsGenerated: 1,
            sentenceDiscards: 1,
            storyDiscards: 1,
            sentencesWithoutEvents: 1,
            sentencesSkipped: 1,
        });
        expect(console.info).toHaveBeenCalledWith('[StoryCoder]   Events generated: 1');
    });

    it('should stop on a failed sentence when asked', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), { ...DEFAULT_CODER_CONFIG, stopOnError: true }, bus);
        const broken: Story = {
            id: 'ST-3',
            date: '20130926',
            sentences: [{ id: 'ST-3-1', text: 'Broken.', parse: '(ROOT (S (NP (NNP FRANCE))' }],
        };

        let thrown: unknown;
        try {
            coder.codeStory(broken);
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toBeInstanceOf(CoderError);
        expect(thrown).toMatchObject({ code: 'stopped_on_error', message: 'Stopped on bad_input_parse in ST-3-1' });
    });

    it('should code no more than the configured number of sentences', () => {
        const coder = new StoryCoder(
            buildTestDictionaries(bus),
            { ...DEFAULT_CODER_CONFIG, maxSentencesPerStory: 1 },
            bus
        );
        const short: Story = {
            id: 'ST-4',
            date: '20130926',
            sentences: [
                { id: 'ST-4-1', text: 'Italy slept.', parse: SLEEP },
                { id: 'ST-4-2', text: 'France attacked Germany.', parse: ATTACK },
            ],
        };

        const result = coder.codeStory(short);

        expect(result.sentences.map(outcome => outcome.sentenceId)).toEqual(['ST-4-1']);
        expect(console.info).toHaveBeenCalledWith('[StoryCoder] ST-4: coding the first 1 of 2 sentences');
    });

    it('should skip the sentences of a story with a bad date', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        const skipped = vi.fn();
        bus.on('story-skipped', skipped);

        const result = coder.codeStory({ id: 'ST-5', date: '2013-09', sentences: [BAD_DATE_SENTENCE] });

        expect(result.sentences).toEqual([
            {
                status: 'skipped',
                sentenceId: 'ST-5-1',
                failure: { tag: 'story_date', message: 'Story ST-5 has no usable date', sentenceId: 'ST-5-1' },
            },
        ]);
        expect(skipped).toHaveBeenCalledWith({ storyId: 'ST-5', message: 'Date "2013-09" could not be interpreted' });
        expect(console.warn).toHaveBeenCalledWith('[StoryCoder] ST-5 skipped: Date "2013-09" could not be interpreted');
    });

    it('should keep coding the batch after a story with a bad date', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        const good: Story = {
            id: 'ST-6',
            date: '20130926',
            sentences: [{ id: 'ST-6-1', text: 'France attacked Germany.', parse: ATTACK }],
        };

        const { stories, summary } = coder.codeStories([
            { id: 'ST-5', date: '2013-09', sentences: [BAD_DATE_SENTENCE] },
            good,
        ]);

        expect(stories[1].sentences).toEqual([
            { status: 'coded', sentenceId: 'ST-6-1', events: [{ source: 'FRA', target: 'GMY', eventCode: '190' }], issues: [] },
        ]);
        expect(summary).toEqual({
            storiesRead: 2,
            sentencesCoded: 1,
            eventsGenerated: 1,
            sentenceDiscards: 0,
            storyDiscards: 0,
            sentencesWithoutEvents: 0,
            sentencesSkipped: 1,
        });
        expect(console.info).toHaveBeenCalledWith('[StoryCoder]   Sentences skipped: 1');
    });

    it('should throw on a bad date when stopping on errors', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), { ...DEFAULT_CODER_CONFIG, stopOnError: true }, bus);

        expect(() => coder.codeStory({ id: 'ST-5', date: '2013-09', sentences: [] })).toThrow(CoderError);
    });

    it('should report a broken parse before looking for discard phrases', () => {
        const coder = new StoryCoder(buildTestDictionaries(bus), DEFAULT_CODER_CONFIG, bus);
        const discards = vi.fn();
        bus.on('sentence-discarded', discards);

        const result = coder.codeStory({
            id: 'ST-7',
            date: '20130926',
            sentences: [{ id: 'ST-7-1', text: 'Soccer fans were angry.', parse: '(ROOT (S (NP (NNP FRANCE))' }],
        });

        expect(result.sentences).toEqual([
            {
                status: 'skipped',
                sentenceId: 'ST-7-1',
                failure: {
                    tag: 'bad_input_parse',
                    message: 'Parse input was not balanced (4 open, 2 close)',
                    sentenceId: 'ST-7-1',
                },
            },
        ]);
        expect(discards).not.toHaveBeenCalled();
    });
});
