/**
 * Flat token sequence for one sentence.
 *
 * Phrase structure is kept as open/close markers so the coder can walk the
 * sentence left to right and match patterns with gap/adjacency rules.
 */

export type Token =
    | { kind: 'open'; label: string; index?: number }
    | { kind: 'close'; label: string; index?: number }
    | { kind: 'entity-open'; code: string; root?: string }
    | { kind: 'entity-close' }
    | { kind: 'compound-open'; index: number }
    | { kind: 'compound-close'; index: number }
    | { kind: 'word'; text: string };

export type TokenKind = Token['kind'];
export type EntityOpenToken = Extract<Token, { kind: 'entity-open' }>;

/** Tokens before this position (`ROOT` and `S`) are never coded */
export const PARSE_START = 2;

export function isOpening(token: Token): boolean {
    return token.kind === 'open' || token.kind === 'entity-open' || token.kind === 'compound-open';
}

export function isClosing(token: Token): boolean {
    return token.kind === 'close' || token.kind === 'entity-close' || token.kind === 'compound-close';
}

/** Identity shared by an opening token and its close */
export function markerKey(token: Token): string | null {
    switch (token.kind) {
        case 'open':
        case 'close':
            return token.index === undefined ? token.label : `${token.label}${token.index}`;
        case 'entity-open':
        case 'entity-close':
            return 'NE';
        case 'compound-open':
        case 'compound-close':
            return `NEC${token.index}`;
        case 'word':
            return null;
    }
}

export function isWord(token: Token | undefined): token is Extract<Token, { kind: 'word' }> {
    return token?.kind === 'word';
}

export function isOpenLabel(token: Token | undefined, prefix: string): boolean {
    return token?.kind === 'open' && token.label.startsWith(prefix);
}

export function isCloseLabel(token: Token | undefined, prefix: string): boolean {
    return token?.kind === 'close' && token.label.startsWith(prefix);
}

/** Index of the close matching the opening token at `start`, or -1 */
export function findMatchingClose(tokens: Token[], start: number): number {
    let depth = 0;
    for (let i = start; i < tokens.length; i++) {
        if (isOpening(tokens[i])) depth++;
        else if (isClosing(tokens[i])) {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

/** Every close pairs with the innermost unclosed opening of the same key */
export function isBalanced(tokens: Token[]): boolean {
    const stack: string[] = [];
    for (const token of tokens) {
        if (isOpening(token)) {
            stack.push(markerKey(token) ?? '');
        } else if (isClosing(token)) {
            if (stack.pop() !== markerKey(token)) return false;
        }
    }
    return stack.length === 0;
}

export function wordsOf(tokens: Token[]): string[] {
    const words: string[] = [];
    for (const token of tokens) {
        if (token.kind === 'word') words.push(token.text);
    }
    return words;
}

/** Bracketed rendering, mainly for logs and tests */
export function renderTokens(tokens: Token[]): string {
    return tokens
        .map(token => {
            switch (token.kind) {
                case 'open':
                    return `(${markerKey(token)}`;
                case 'close':
                    return `~${markerKey(token)}`;
                case 'entity-open':
                    return `(NE ${token.code}`;
                case 'entity-close':
                    return '~NE';
                case 'compound-open':
                    return `(NEC${token.index}`;
                case 'compound-close':
                    return `~NEC${token.index}`;
                case 'word':
                    return token.text;
            }
        })
        .join(' ');
}
