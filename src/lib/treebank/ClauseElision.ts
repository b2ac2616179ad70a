/**
 * Comma-delimited clause removal.
 *
 * Works on the flat token sequence after normalization. Three passes
 * (opening clause, closing clause, clauses between sibling commas) each
 * drop complete phrases when the clause word count falls inside the
 * configured window; a pass whose upper bound is 0 is off.
 */

import type { CoderConfig } from '@/lib/config/coderConfig';
import { fail, ok, type CodingResult } from '@/lib/core/errors';
import { findMatchingClose, isBalanced, isClosing, isOpening, markerKey, PARSE_START, type Token } from './tokens';

export type ElisionConfig = Pick<
    CoderConfig,
    'commaMin' | 'commaMax' | 'commaBMin' | 'commaBMax' | 'commaEMin' | 'commaEMax'
>;

function isCommaOpen(token: Token | undefined): boolean {
    return token?.kind === 'open' && token.label === ',';
}

/** Words in [from, to) that start with a letter; punctuation and markup don't count */
export function countWords(tokens: Token[], from: number, to: number): number {
    let count = 0;
    for (let i = Math.max(from, 0); i < Math.min(to, tokens.length); i++) {
        const token = tokens[i];
        if (token.kind === 'word' && /^[A-Z]/i.test(token.text)) count++;
    }
    return count;
}

/** Position of the sentence-final punctuation open */
function findEnd(tokens: Token[]): number {
    let k = tokens.length - 1;
    while (k >= PARSE_START && isClosing(tokens[k])) k--;
    return k - 1;
}

function firstComma(tokens: Token[]): number {
    for (let i = PARSE_START; i < tokens.length; i++) {
        if (isCommaOpen(tokens[i])) return i;
    }
    return -1;
}

function lastCommaBefore(tokens: Token[], end: number): number {
    for (let i = end - 1; i >= PARSE_START; i--) {
        if (isCommaOpen(tokens[i])) return i;
    }
    return -1;
}

/** Next comma under the same parent, or -1 when the parent closes first */
function siblingComma(tokens: Token[], comma: number): number {
    let depth = 0;
    for (let i = comma + 3; i < tokens.length; i++) {
        const token = tokens[i];
        if (depth === 0 && isCommaOpen(token)) return i;
        if (isOpening(token)) depth++;
        else if (isClosing(token)) {
            depth--;
            if (depth < 0) return -1;
        }
    }
    return -1;
}

/**
 * Delete every complete phrase lying inside [from, to). Phrases that only
 * partly overlap the range stay.
 */
export function deletePhrases(tokens: Token[], from: number, to: number): void {
    const closes: Array<string | null> = [];
    for (let k = to - 1; k >= from; k--) {
        const token = tokens[k];
        if (isClosing(token)) {
            closes.push(markerKey(token));
        } else if (isOpening(token) && closes.length > 0 && closes[closes.length - 1] === markerKey(token)) {
            const end = findMatchingClose(tokens, k);
            if (end >= 0) tokens.splice(k, end - k + 1);
            closes.pop();
        }
    }
}

export function elideClauses(input: Token[], config: ElisionConfig, sentenceId?: string): CodingResult<Token[]> {
    if (!input.some(isCommaOpen)) return ok(input);
    const tokens = [...input];

    if (config.commaBMax !== 0) {
        const comma = firstComma(tokens);
        if (comma >= 0) {
            const count = countWords(tokens, PARSE_START, comma);
            if (count >= config.commaBMin && count <= config.commaBMax) {
                deletePhrases(tokens, PARSE_START, comma);
            }
        }
    }

    if (config.commaEMax !== 0) {
        const end = findEnd(tokens);
        const comma = lastCommaBefore(tokens, end);
        if (comma >= 0) {
            const count = countWords(tokens, comma, tokens.length);
            if (count >= config.commaEMin && count <= config.commaEMax) {
                deletePhrases(tokens, comma + 3, end);
            }
        }
    }

    if (config.commaMax !== 0) {
        const commas = tokens.filter(isCommaOpen);
        for (const commaToken of commas) {
            const start = tokens.indexOf(commaToken);
            if (start < 0) continue;
            const next = siblingComma(tokens, start);
            if (next < 0) continue;
            const count = countWords(tokens, start + 2, next);
            if (count >= config.commaMin && count <= config.commaMax) {
                deletePhrases(tokens, start, next);
            }
        }
    }

    // dangling commas left at either edge
    const leading = firstComma(tokens);
    if (leading >= 0 && countWords(tokens, PARSE_START, leading) === 0) {
        tokens.splice(leading, 3);
    }
    const end = findEnd(tokens);
    const trailing = lastCommaBefore(tokens, end);
    if (trailing >= 0 && countWords(tokens, trailing + 1, end) === 0) {
        tokens.splice(trailing, 3);
    }

    if (!isBalanced(tokens)) {
        return fail('comma_balance', 'Token sequence unbalanced after clause elision', sentenceId);
    }
    return ok(tokens);
}
