/**
 * EntityResolver - assigns actor codes to entity spans
 *
 * Compound members embedded in an entity are split out first, so every
 * entity that reaches lookup holds plain words. Lookup takes the longest
 * actor phrase at the earliest position, then composes any agent codes
 * found anywhere in the span onto it.
 */

import { fail, ok, type CodingResult } from '@/lib/core/errors';
import { resolveActorCode, UNRESOLVED_CODE } from '@/lib/dictionaries/ActorDictionary';
import type { ActorTable, AgentPattern, AgentTable, PhrasePattern } from '@/lib/dictionaries/types';
import { findMatchingClose, PARSE_START, wordsOf, type Token } from '@/lib/treebank/tokens';
import type { CodingContext } from './CodingContext';

// ==================== PHRASE MATCHING ====================

/**
 * Does `pattern` match `words` starting at `start`? The first word is
 * already known to match. A `_` connector forbids a gap, `' '` allows one.
 */
export function matchPhrase(pattern: PhrasePattern, words: string[], start: number): boolean {
    if (pattern.words.length === 1) return true;

    let kfrag = start + 1;
    let kpat = 1;
    let connector = pattern.connectors[0];
    while (kfrag < words.length) {
        if (words[kfrag] === pattern.words[kpat]) {
            kfrag++;
            kpat++;
            if (kpat >= pattern.words.length) return true;
            connector = pattern.connectors[kpat - 1];
        } else {
            if (connector === '_') return false;
            kfrag++;
        }
    }
    return false;
}

export interface ActorMatch {
    slot: number;
    root: string;
}

/** First position holding any actor phrase; longest phrase wins there */
export function findActor(words: string[], actors: ActorTable): ActorMatch | null {
    for (let i = 0; i < words.length; i++) {
        const candidates = actors.patterns.get(words[i]);
        if (!candidates) continue;
        for (const pattern of candidates) {
            if (matchPhrase(pattern, words, i)) {
                return { slot: pattern.slot, root: actors.codes[pattern.slot]?.root ?? UNRESOLVED_CODE };
            }
        }
    }
    return null;
}

export function findAgents(words: string[], agents: AgentTable): AgentPattern[] {
    const found: AgentPattern[] = [];
    for (let i = 0; i < words.length; i++) {
        const candidates = agents.patterns.get(words[i]);
        const match = candidates?.find(pattern => matchPhrase(pattern, words, i));
        if (match && !found.some(agent => agent.code === match.code)) found.push(match);
    }
    return found;
}

/** Agent codes already present in three-letter steps of the actor code are skipped */
export function composeCode(actorCode: string, agents: AgentPattern[]): string {
    let code = actorCode;
    for (const agent of agents) {
        let duplicate = false;
        for (let at = code.indexOf(agent.code); at >= 0; at = code.indexOf(agent.code, at + 1)) {
            if (at % 3 === 0) {
                duplicate = true;
                break;
            }
        }
        if (duplicate) continue;
        code = agent.attach === 'back' ? code + agent.code : agent.code + code;
    }
    return code;
}

export function resolveWords(
    words: string[],
    ctx: Pick<CodingContext, 'dictionaries' | 'ordinalDate'>
): { code: string; root: string } {
    const { actors, agents } = ctx.dictionaries;
    const actor = findActor(words, actors);
    const actorCode = actor ? resolveActorCode(actors.codes[actor.slot], ctx.ordinalDate) : UNRESOLVED_CODE;
    const root = actor?.root ?? UNRESOLVED_CODE;

    const agentMatches = findAgents(words, agents);
    if (agentMatches.length === 0) return { code: actorCode, root };
    return { code: composeCode(actorCode, agentMatches), root };
}

// ==================== COMPOUND EXPANSION ====================

/**
 * Rewrite an entity that embeds a compound into a compound of entities.
 * Each member gets the words around the compound, so
 * `(NE THE (NEC A AND B) ARMIES)` becomes
 * `(NEC (NE THE A ARMIES) (NE THE B ARMIES))`.
 */
export function expandEmbeddedCompound(
    entity: Token[],
    nextIndex: () => number,
    sentenceId?: string
): CodingResult<Token[]> {
    const inner = entity.slice(1, -1);
    const start = inner.findIndex(token => token.kind === 'compound-open');
    const end = start >= 0 ? findMatchingClose(inner, start) : -1;
    if (start < 0 || end < 0) {
        return fail('compound_expansion', 'Entity has no complete compound to expand', sentenceId);
    }
    const before = inner.slice(0, start);
    const after = inner.slice(end + 1);

    const expanded: Token[] = [];
    let memberCount = 0;
    let k = start + 1;
    while (k < end) {
        const token = inner[k];
        const isMember = (token.kind === 'open' && token.label.startsWith('N')) || token.kind === 'compound-open';
        if (!isMember) {
            k++;
            continue;
        }
        const memberEnd = findMatchingClose(inner, k);
        if (memberEnd < 0 || memberEnd > end) {
            return fail('compound_expansion', 'Compound member is not closed', sentenceId);
        }
        const body = token.kind === 'compound-open' ? inner.slice(k, memberEnd + 1) : inner.slice(k + 1, memberEnd);
        const member: Token[] = [
            { kind: 'entity-open', code: UNRESOLVED_CODE },
            ...before,
            ...body,
            ...after,
            { kind: 'entity-close' },
        ];

        if (body.some(item => item.kind === 'compound-open')) {
            const nested = expandEmbeddedCompound(member, nextIndex, sentenceId);
            if (!nested.success) return nested;
            expanded.push(...nested.value);
        } else {
            expanded.push(...member);
        }
        memberCount++;
        k = memberEnd + 1;
    }

    if (memberCount === 0) {
        return fail('compound_expansion', 'Embedded compound has no noun members', sentenceId);
    }
    const index = nextIndex();
    return ok([{ kind: 'compound-open', index }, ...expanded, { kind: 'compound-close', index }]);
}

// ==================== RESOLUTION ====================

export function resolveEntities(ctx: CodingContext): CodingResult<void> {
    const tokens = ctx.tokens;
    let k = PARSE_START;
    while (k < tokens.length) {
        if (tokens[k].kind !== 'entity-open') {
            k++;
            continue;
        }

        const end = findMatchingClose(tokens, k);
        if (end < 0) return fail('get_NE_error', 'Entity is not closed', ctx.sentenceId);
        const entity = tokens.slice(k, end + 1);

        if (entity.some(token => token.kind === 'compound-open')) {
            let nextIndex = ctx.nextCompoundIndex();
            const expanded = expandEmbeddedCompound(entity, () => nextIndex++, ctx.sentenceId);
            if (!expanded.success) return expanded;
            tokens.splice(k, end - k + 1, ...expanded.value);
            // rescan: the compound's members are resolved on the next passes
            continue;
        }

        const { code, root } = resolveWords(wordsOf(entity), ctx);
        tokens[k] = { kind: 'entity-open', code, root };
        k = end + 1;
    }
    return ok(undefined);
}
