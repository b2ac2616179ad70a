/**
 * Matches one side of a verb pattern against a context sequence.
 *
 * Entity and compound markers never consume pattern atoms; they only track
 * whether the walk is inside a span. `$`, `+`, `^` and `%` act on the span
 * the walk is in and are skipped over (or fail, for `_`) outside one.
 */

import { fail, ok, type CodingResult } from '@/lib/core/errors';
import type { PatternStep, VerbTable } from '@/lib/dictionaries/types';
import type { ContextItem, Locator, Locators, SequenceSide } from './types';

type ItemKind = ContextItem['kind'];

function findItem(sequence: ContextItem[], from: number, kind: ItemKind, step: 1 | -1): number {
    for (let i = from; i >= 0 && i < sequence.length; i += step) {
        if (sequence[i].kind === kind) return i;
    }
    return -1;
}

function locatorAt(sequence: ContextItem[], side: SequenceSide, position: number): Locator {
    return { side, position, tokenIndex: sequence[position].tokenIndex };
}

/**
 * Number of sequence items a synonym-set member covers at `at`, or 0.
 * Single-word members are tried before phrases; phrases run backwards in
 * the upper sequence.
 */
export function matchSynset(
    members: string[][],
    sequence: ContextItem[],
    at: number,
    side: SequenceSide
): number {
    const item = sequence[at];
    if (item.kind !== 'word') return 0;
    if (members.some(member => member.length === 1 && member[0] === item.text)) return 1;

    for (const member of members) {
        if (member.length < 2) continue;
        const words = side === 'upper' ? [...member].reverse() : member;
        const fits = words.every((word, j) => {
            const candidate = sequence[at + j];
            return candidate?.kind === 'word' && candidate.text === word;
        });
        if (fits) return words.length;
    }
    return 0;
}

export function matchPatternSide(
    steps: PatternStep[],
    sequence: ContextItem[],
    side: SequenceSide,
    verbs: Pick<VerbTable, 'synsets'>,
    locators: Locators,
    sentenceId?: string
): CodingResult<boolean> {
    if (steps.length === 0) return ok(true);
    if (sequence.length === 0) return ok(false);

    // walking away from the verb: upper searches forward for an open, lower backward
    const outward: 1 | -1 = side === 'upper' ? 1 : -1;
    let insideEntity = false;
    let insideCompound = false;
    let kpat = 0;
    let kseq = 0;

    while (kpat < steps.length) {
        const item = sequence[kseq];
        const { connector, atom } = steps[kpat];

        if (item.kind === 'entity-open' || item.kind === 'entity-close') {
            insideEntity = !insideEntity;
            if (++kseq >= sequence.length) return ok(false);
            continue;
        }
        if (item.kind === 'compound-open' || item.kind === 'compound-close') {
            insideCompound = !insideCompound;
            if (++kseq >= sequence.length) return ok(false);
            continue;
        }

        if (atom.kind === 'source' || atom.kind === 'target' || atom.kind === 'skip-entity' || atom.kind === 'compound') {
            if (!insideEntity && !insideCompound) {
                if (connector === '_') return ok(false);
                if (++kseq >= sequence.length) return ok(false);
                continue;
            }

            if (atom.kind === 'compound' && insideCompound) {
                const at = findItem(sequence, kseq, 'compound-open', outward);
                if (at < 0) return ok(false);
                locators.source = locatorAt(sequence, side, at);
                locators.target = locatorAt(sequence, side, at);
            } else if (insideEntity && (atom.kind === 'source' || atom.kind === 'target')) {
                const at = findItem(sequence, kseq, 'entity-open', outward);
                if (at < 0) {
                    return fail('sequence_bounds', `No entity start for ${atom.kind} in ${side} sequence`, sentenceId);
                }
                locators[atom.kind] = locatorAt(sequence, side, at);
            } else if (insideEntity && atom.kind === 'skip-entity') {
                const at = findItem(sequence, kseq, side === 'upper' ? 'entity-open' : 'entity-close', 1);
                if (at < 0) {
                    return fail('sequence_bounds', `No entity boundary to skip to in ${side} sequence`, sentenceId);
                }
                kseq = at;
                insideEntity = false;
            }

            if (++kpat >= steps.length) return ok(true);
            if (++kseq >= sequence.length) return ok(false);
            continue;
        }

        let covered = 0;
        if (atom.kind === 'literal') {
            covered = item.kind === 'word' && item.text === atom.word ? 1 : 0;
        } else {
            const members = verbs.synsets.get(atom.name);
            covered = members ? matchSynset(members, sequence, kseq, side) : 0;
        }

        if (covered > 0) {
            kseq += covered - 1;
            if (++kpat >= steps.length) return ok(true);
            if (++kseq >= sequence.length) return ok(false);
        } else {
            if (connector === '_') return ok(false);
            if (++kseq >= sequence.length) return ok(false);
        }
    }
    return ok(true);
}
