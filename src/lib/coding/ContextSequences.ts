import { PARSE_START, type Token } from '@/lib/treebank/tokens';
import type { ContextItem } from './types';

function toItem(token: Token, tokenIndex: number): ContextItem | null {
    switch (token.kind) {
        case 'entity-open':
            return { kind: 'entity-open', tokenIndex, code: token.code };
        case 'entity-close':
        case 'compound-open':
        case 'compound-close':
            return { kind: token.kind, tokenIndex };
        case 'word':
            return { kind: 'word', tokenIndex, text: token.text };
        case 'open':
        case 'close':
            return null;
    }
}

/** Tokens before the verb, nearest first, back to the coding start or a comma */
export function buildUpperSequence(tokens: Token[], start: number): ContextItem[] {
    const items: ContextItem[] = [];
    for (let i = start; i >= PARSE_START; i--) {
        const token = tokens[i];
        if (token.kind === 'close' && token.label === ',') break;
        const item = toItem(token, i);
        if (item) items.push(item);
    }
    return items;
}

/** Tokens after the verb up to (not including) the verb phrase close */
export function buildLowerSequence(tokens: Token[], start: number, end: number): ContextItem[] {
    const items: ContextItem[] = [];
    for (let i = start; i < end && i < tokens.length; i++) {
        const item = toItem(tokens[i], i);
        if (item) items.push(item);
    }
    return items;
}

export function isCoded(code: string): boolean {
    return !code.startsWith('---');
}
