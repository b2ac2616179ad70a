/**
 * Discard phrases: a sentence containing one is not coded; a `+` phrase
 * drops the rest of the story. A trailing `_` asks for a whole-word ending.
 * Matching ignores case and expects the phrase to start a word.
 */

import { readDictionaryLines, stripInlineComment } from './DictionaryReader';
import type { DiscardList, DiscardPhrase } from './types';

export function compileDiscardList(source: string): DiscardList {
    const phrases: DiscardPhrase[] = [];

    for (const { text } of readDictionaryLines(source)) {
        let phrase = stripInlineComment(text).trim().toUpperCase();
        const story = phrase.startsWith('+');
        if (story) phrase = phrase.slice(1).trim();
        const wholeWord = phrase.endsWith('_');
        if (wholeWord) phrase = phrase.slice(0, -1);
        if (phrase.length === 0) continue;
        phrases.push({ phrase, story, wholeWord });
    }

    return { phrases };
}

export type DiscardCheck =
    | { kind: 'none' }
    | { kind: 'sentence'; phrase: string }
    | { kind: 'story'; phrase: string };

const WORD_END = ' .!?';

function occursIn(text: string, entry: DiscardPhrase): boolean {
    const target = ' ' + entry.phrase;
    let from = text.indexOf(target);
    while (from >= 0) {
        const next = from + target.length;
        if (!entry.wholeWord || next >= text.length || WORD_END.includes(text[next])) return true;
        from = text.indexOf(target, from + 1);
    }
    return false;
}

/** Story phrases take precedence over sentence phrases */
export function checkDiscards(text: string, list: DiscardList | undefined): DiscardCheck {
    if (!list) return { kind: 'none' };
    const padded = ' ' + text.toUpperCase();

    for (const entry of list.phrases) {
        if (entry.story && occursIn(padded, entry)) return { kind: 'story', phrase: entry.phrase };
    }
    for (const entry of list.phrases) {
        if (!entry.story && occursIn(padded, entry)) return { kind: 'sentence', phrase: entry.phrase };
    }
    return { kind: 'none' };
}
