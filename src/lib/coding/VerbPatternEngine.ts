/**
 * VerbPatternEngine - finds coded verbs and decides who did what to whom
 *
 * Each `(VP (VB...` opening is a candidate. The verb's dictionary entry
 * (after multi-word continuations) supplies patterns that are tried against
 * the words before the verb (upper) and inside the verb phrase (lower).
 * Whatever the patterns leave unassigned is filled by the default rules.
 */

import { fail, ok, type CodingResult } from '@/lib/core/errors';
import { NULL_CODE, primaryEntryFor } from '@/lib/dictionaries/VerbDictionary';
import type { MultiWordVerb, VerbPattern, VerbTable } from '@/lib/dictionaries/types';
import {
    findMatchingClose,
    isCloseLabel,
    isOpenLabel,
    PARSE_START,
    type Token,
} from '@/lib/treebank/tokens';
import type { CodingContext } from './CodingContext';
import { buildLowerSequence, buildUpperSequence, isCoded } from './ContextSequences';
import { assembleEvents, locatedCodes } from './EventAssembler';
import { matchPatternSide } from './VerbPatternMatcher';
import type { ContextItem, ContextSequences, Locator, Locators } from './types';

const PASSIVE_AUXILIARIES = new Set(['WAS', 'IS', 'BEEN']);

// ==================== VERB LOCATION ====================

/**
 * Position of the participle when the phrase starting at `vpStart` is a
 * `was/is/been ... VBN ... BY` passive, otherwise -1.
 */
export function findPassiveVerb(tokens: Token[], vpStart: number, vpEnd: number): number {
    let participleClose = -1;
    for (let i = vpStart + 3; i < vpEnd; i++) {
        if (isCloseLabel(tokens[i], 'VBN')) {
            participleClose = i;
            break;
        }
    }
    if (participleClose < 0) return -1;

    let hasAgent = false;
    for (let i = participleClose + 1; i < vpEnd; i++) {
        const token = tokens[i];
        if (token.kind === 'word' && token.text === 'BY') {
            hasAgent = true;
            break;
        }
    }
    if (!hasAgent) return -1;

    for (let k = participleClose - 3; k > vpStart; k--) {
        const previous = tokens[k - 1];
        if (isCloseLabel(tokens[k], 'VB') && previous?.kind === 'word' && PASSIVE_AUXILIARIES.has(previous.text)) {
            return participleClose - 1;
        }
    }
    return -1;
}

interface SequenceBounds {
    upperStart: number;
    lowerStart: number;
}

/** Continuation words must appear in order, ignoring markup */
export function matchMultiWord(
    tokens: Token[],
    verbAt: number,
    vpEnd: number,
    multi: MultiWordVerb
): SequenceBounds | null {
    if (multi.after) {
        let k = verbAt + 1;
        let last = verbAt;
        for (const word of multi.words) {
            while (k < vpEnd && tokens[k].kind !== 'word') k++;
            const token = tokens[k];
            if (k >= vpEnd || token.kind !== 'word' || token.text !== word) return null;
            last = k++;
        }
        return { upperStart: verbAt - 1, lowerStart: last + 1 };
    }

    let k = verbAt - 1;
    let earliest = verbAt;
    for (const word of multi.words) {
        while (k >= PARSE_START && tokens[k].kind !== 'word') k--;
        const token = tokens[k];
        if (k < PARSE_START || token.kind !== 'word' || token.text !== word) return null;
        earliest = k--;
    }
    return { upperStart: earliest - 1, lowerStart: verbAt + 1 };
}

interface VerbReading {
    code: string;
    patterns: VerbPattern[];
    bounds: SequenceBounds;
}

export function readVerb(verbs: VerbTable, tokens: Token[], verbAt: number, vpEnd: number): VerbReading | null {
    const token = tokens[verbAt];
    if (token?.kind !== 'word') return null;
    const entry = verbs.verbs.get(token.text);
    if (!entry) return null;

    for (const multi of entry.multiWords) {
        const bounds = matchMultiWord(tokens, verbAt, vpEnd, multi);
        if (bounds) {
            return { code: multi.code, patterns: primaryEntryFor(verbs, multi.primary)?.patterns ?? [], bounds };
        }
    }
    return {
        code: entry.code,
        patterns: primaryEntryFor(verbs, token.text)?.patterns ?? [],
        bounds: { upperStart: verbAt - 1, lowerStart: verbAt + 1 },
    };
}

// ==================== DEFAULT ASSIGNMENT ====================

function locate(sequence: ContextItem[], side: Locator['side'], position: number): Locator {
    return { side, position, tokenIndex: sequence[position].tokenIndex };
}

function matchingCompoundOpen(upper: ContextItem[], close: number): number {
    let depth = 0;
    for (let j = close + 1; j < upper.length; j++) {
        const kind = upper[j].kind;
        if (kind === 'compound-close') depth++;
        else if (kind === 'compound-open') {
            if (depth === 0) return j;
            depth--;
        }
    }
    return -1;
}

/**
 * First coded entity or compound walking out from the verb, otherwise the
 * first entity at all.
 */
export function defaultSource(upper: ContextItem[]): Locator | null {
    for (let i = 0; i < upper.length; i++) {
        const item = upper[i];
        if (item.kind === 'compound-close') {
            const open = matchingCompoundOpen(upper, i);
            if (open >= 0) return locate(upper, 'upper', open);
        }
        if (item.kind === 'entity-open' && isCoded(item.code)) return locate(upper, 'upper', i);
    }
    const first = upper.findIndex(item => item.kind === 'entity-open');
    return first >= 0 ? locate(upper, 'upper', first) : null;
}

/**
 * Target priority: differently coded (or compound) in the lower sequence,
 * uncoded in the lower sequence, differently coded (or compound) in the
 * upper sequence beyond the source, then any other uncoded upper entity.
 */
export function defaultTarget(
    sequences: ContextSequences,
    source: Locator,
    sourceCode: string | null
): Locator | null {
    const { upper, lower } = sequences;
    const differs = (item: ContextItem) =>
        item.kind === 'compound-open' ||
        (item.kind === 'entity-open' && isCoded(item.code) && item.code !== sourceCode);
    const uncoded = (item: ContextItem) => item.kind === 'entity-open' && !isCoded(item.code);

    let at = lower.findIndex(differs);
    if (at >= 0) return locate(lower, 'lower', at);
    at = lower.findIndex(uncoded);
    if (at >= 0) return locate(lower, 'lower', at);

    const beyond = source.side === 'upper' ? source.position : -1;
    at = upper.findIndex((item, i) => i > beyond && differs(item));
    if (at >= 0) return locate(upper, 'upper', at);
    at = upper.findIndex((item, i) => uncoded(item) && !(source.side === 'upper' && i === source.position));
    return at >= 0 ? locate(upper, 'upper', at) : null;
}

// ==================== ENGINE ====================

interface PatternOutcome {
    code: string;
    locators: Locators;
}

function tryPatterns(
    ctx: CodingContext,
    reading: VerbReading,
    sequences: ContextSequences
): CodingResult<PatternOutcome | null> {
    let nullMatch: Locators | null = null;
    for (const pattern of reading.patterns) {
        const locators: Locators = { source: null, target: null };
        const upper = matchPatternSide(pattern.upper, sequences.upper, 'upper', ctx.dictionaries.verbs, locators, ctx.sentenceId);
        if (!upper.success) return upper;
        if (!upper.value) continue;
        const lower = matchPatternSide(pattern.lower, sequences.lower, 'lower', ctx.dictionaries.verbs, locators, ctx.sentenceId);
        if (!lower.success) return lower;
        if (!lower.value) continue;

        if (pattern.code !== NULL_CODE) return ok({ code: pattern.code, locators });
        // a null-coded pattern blocks the rest; only the verb's own code can still apply
        nullMatch = locators;
        break;
    }

    if (reading.code === NULL_CODE) return ok(null);
    return ok({ code: reading.code, locators: nullMatch ?? { source: null, target: null } });
}

/**
 * Code the verb phrase opening at `vpStart`. Returns the position to resume
 * scanning from.
 */
function codeVerbPhrase(ctx: CodingContext, vpStart: number): CodingResult<number> {
    const tokens = ctx.tokens;
    const vpEnd = findMatchingClose(tokens, vpStart);
    if (vpEnd < 0) return fail('verb_phrase_end', 'Verb phrase has no close marker', ctx.sentenceId);

    const passiveAt = findPassiveVerb(tokens, vpStart, vpEnd);
    const passive = passiveAt >= 0;
    const verbAt = passive ? passiveAt : vpStart + 2;

    const reading = readVerb(ctx.dictionaries.verbs, tokens, verbAt, vpEnd);
    if (!reading) return ok(vpStart + 1);

    const sequences: ContextSequences = {
        upper: buildUpperSequence(tokens, reading.bounds.upperStart),
        lower: buildLowerSequence(tokens, reading.bounds.lowerStart, vpEnd),
    };
    const outcome = tryPatterns(ctx, reading, sequences);
    if (!outcome.success) return outcome;
    if (!outcome.value) return ok(vpStart + 1);

    const { code, locators } = outcome.value;
    const source = locators.source ?? defaultSource(sequences.upper);
    if (!source) {
        console.warn(`[VerbPatternEngine] No source entity for the verb at ${verbAt} in ${ctx.sentenceId}`);
        return ok(vpEnd + 1);
    }
    let target = locators.target;
    if (!target) {
        const sourceCodes = locatedCodes(tokens, source, ctx.config);
        target = defaultTarget(sequences, source, sourceCodes.length === 1 ? sourceCodes[0].code : null);
    }
    if (!target) {
        console.warn(`[VerbPatternEngine] No target entity for the verb at ${verbAt} in ${ctx.sentenceId}`);
        return ok(vpEnd + 1);
    }
    assembleEvents(ctx, source, target, code, passive);
    return ok(vpEnd + 1);
}

/** Scan the sentence for verb phrases and add their events to the context */
export function codeVerbs(ctx: CodingContext): CodingResult<void> {
    let k = PARSE_START;
    while (k < ctx.tokens.length - 1) {
        const token = ctx.tokens[k];
        if (token.kind === 'open' && token.label === 'VP' && isOpenLabel(ctx.tokens[k + 1], 'VB')) {
            const next = codeVerbPhrase(ctx, k);
            if (!next.success) return next;
            k = next.value;
        } else {
            k++;
        }
    }
    return ok(undefined);
}
