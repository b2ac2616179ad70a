/**
 * EventAssembler - turns located source/target spans into event triples
 */

import type { CoderConfig } from '@/lib/config/coderConfig';
import { UNRESOLVED_CODE } from '@/lib/dictionaries/ActorDictionary';
import { findMatchingClose, wordsOf, type Token } from '@/lib/treebank/tokens';
import type { CodingContext } from './CodingContext';
import type { CodedEvent, LocatedCode, Locator } from './types';

export const SYMMETRIC_SEPARATOR = ':';

// ==================== CODE EXTRACTION ====================

function entityText(tokens: Token[], open: number): string {
    const close = findMatchingClose(tokens, open);
    return wordsOf(tokens.slice(open + 1, close < 0 ? undefined : close)).join(' ');
}

function codeForEntity(tokens: Token[], open: number, config: Pick<CoderConfig, 'newActorLength'>): LocatedCode | null {
    const token = tokens[open];
    if (token.kind !== 'entity-open') return null;
    const text = entityText(tokens, open);

    if (token.code !== UNRESOLVED_CODE) {
        return { code: token.code, root: token.root ?? UNRESOLVED_CODE, text };
    }
    if (config.newActorLength > 0) {
        const phrase = `"${text}"`;
        const spaces = phrase.split(' ').length - 1;
        return { code: spaces < config.newActorLength ? phrase : UNRESOLVED_CODE, root: UNRESOLVED_CODE, text };
    }
    return null;
}

/**
 * Codes at a locator: one per coded member for a compound, otherwise the
 * entity's own. Uncoded entities drop out unless new-actor phrases are on;
 * an empty result is reported as a single unresolved code.
 */
export function locatedCodes(
    tokens: Token[],
    locator: Locator,
    config: Pick<CoderConfig, 'newActorLength'>
): LocatedCode[] {
    const codes: LocatedCode[] = [];
    const start = tokens[locator.tokenIndex];

    if (start?.kind === 'compound-open') {
        const end = findMatchingClose(tokens, locator.tokenIndex);
        for (let i = locator.tokenIndex + 1; i < end; i++) {
            const code = codeForEntity(tokens, i, config);
            if (code) codes.push(code);
        }
    } else {
        const code = codeForEntity(tokens, locator.tokenIndex, config);
        if (code) codes.push(code);
    }

    if (codes.length === 0) {
        return [{ code: UNRESOLVED_CODE, root: UNRESOLVED_CODE, text: '' }];
    }
    return codes;
}

/** `030/031` becomes `030` and `031`, in place */
export function expandSlashCodes(codes: LocatedCode[]): LocatedCode[] {
    return codes.flatMap(located =>
        located.code.includes('/')
            ? located.code.split('/').map(code => ({ ...located, code }))
            : [located]
    );
}

// ==================== PAIRING ====================

type AnnotationConfig = Pick<CoderConfig, 'writeActorRoot' | 'writeActorText'>;

function makeEvent(
    source: LocatedCode,
    target: LocatedCode,
    eventCode: string,
    config: AnnotationConfig
): CodedEvent {
    const event: CodedEvent = { source: source.code, target: target.code, eventCode };
    if (config.writeActorRoot) {
        event.sourceRoot = source.root;
        event.targetRoot = target.root;
    }
    if (config.writeActorText) {
        event.sourceText = source.text;
        event.targetText = target.text;
    }
    return event;
}

/** Cross product without self-references; a passive phrase swaps each pair */
export function pairCodes(
    sources: LocatedCode[],
    targets: LocatedCode[],
    eventCode: string,
    passive: boolean,
    config: AnnotationConfig
): CodedEvent[] {
    const events: CodedEvent[] = [];
    for (const source of sources) {
        for (const target of targets) {
            if (source.code === target.code) continue;
            events.push(passive ? makeEvent(target, source, eventCode, config) : makeEvent(source, target, eventCode, config));
        }
    }
    return events;
}

export function buildEvents(
    sources: LocatedCode[],
    targets: LocatedCode[],
    eventCode: string,
    passive: boolean,
    config: AnnotationConfig
): CodedEvent[] {
    const separator = eventCode.indexOf(SYMMETRIC_SEPARATOR);
    if (separator < 0) return pairCodes(sources, targets, eventCode, passive, config);

    let forwardSide = sources;
    let reverseSide = targets;
    if (sources[0]?.code === UNRESOLVED_CODE || targets[0]?.code === UNRESOLVED_CODE) {
        // one side unresolved: the event runs within the other side
        if (targets[0]?.code === UNRESOLVED_CODE) reverseSide = sources;
        else forwardSide = targets;
    }
    const forward = eventCode.slice(0, separator);
    const reverse = eventCode.slice(separator + 1);
    return [
        ...pairCodes(forwardSide, reverseSide, forward, passive, config),
        ...pairCodes(reverseSide, forwardSide, reverse, passive, config),
    ];
}

/** Add the events for one matched verb phrase to the sentence */
export function assembleEvents(
    ctx: CodingContext,
    source: Locator,
    target: Locator,
    eventCode: string,
    passive: boolean
): void {
    const sources = expandSlashCodes(locatedCodes(ctx.tokens, source, ctx.config));
    const targets = expandSlashCodes(locatedCodes(ctx.tokens, target, ctx.config));
    ctx.events.push(...buildEvents(sources, targets, eventCode, passive, ctx.config));
}

// ==================== SENTENCE FINISH ====================

function sameEvent(a: CodedEvent, b: CodedEvent): boolean {
    return (
        a.source === b.source &&
        a.target === b.target &&
        a.eventCode === b.eventCode &&
        a.sourceRoot === b.sourceRoot &&
        a.targetRoot === b.targetRoot &&
        a.sourceText === b.sourceText &&
        a.targetText === b.targetText
    );
}

/** Drop incomplete dyads when required, then duplicates (first one stays) */
export function finalizeEvents(events: CodedEvent[], config: Pick<CoderConfig, 'requireDyad'>): CodedEvent[] {
    const complete = config.requireDyad
        ? events.filter(event => event.source !== UNRESOLVED_CODE && event.target !== UNRESOLVED_CODE)
        : events;
    return complete.filter((event, i) => complete.findIndex(other => sameEvent(event, other)) === i);
}
