import { fail, ok, type CodingResult } from '@/lib/core/errors';

export interface ParseNode {
    label: string;
    children: ParseChild[];
}

export type ParseChild = ParseNode | string;

export function isNode(child: ParseChild): child is ParseNode {
    return typeof child !== 'string';
}

/**
 * Read a Penn-Treebank bracketed parse (upper-cased) into a tree.
 * Unequal bracket counts or stray brackets fail with `bad_input_parse`.
 */
export function parseBracketedTree(text: string, sentenceId?: string): CodingResult<ParseNode> {
    const pieces = text.toUpperCase().match(/\(|\)|[^\s()]+/g) ?? [];
    const opens = pieces.filter(piece => piece === '(').length;
    const closes = pieces.filter(piece => piece === ')').length;
    if (opens === 0 || opens !== closes) {
        return fail('bad_input_parse', `Parse input was not balanced (${opens} open, ${closes} close)`, sentenceId);
    }

    const stack: ParseNode[] = [];
    let root: ParseNode | null = null;

    for (let i = 0; i < pieces.length; i++) {
        const piece = pieces[i];
        if (piece === '(') {
            const next = pieces[i + 1];
            const labelled = next !== undefined && next !== '(' && next !== ')';
            const node: ParseNode = { label: labelled ? next : '', children: [] };
            if (labelled) i++;
            const parent = stack[stack.length - 1];
            if (parent) parent.children.push(node);
            else if (root === null) root = node;
            else return fail('bad_input_parse', 'Parse input has more than one tree', sentenceId);
            stack.push(node);
        } else if (piece === ')') {
            if (stack.pop() === undefined) {
                return fail('bad_input_parse', 'Close bracket without an open bracket', sentenceId);
            }
        } else {
            const parent = stack[stack.length - 1];
            if (!parent) return fail('bad_input_parse', `Word ${piece} outside the tree`, sentenceId);
            parent.children.push(piece);
        }
    }

    if (root === null || stack.length > 0) {
        return fail('bad_input_parse', 'Parse input was not balanced', sentenceId);
    }
    return ok(root);
}

// ==================== TREE HELPERS ====================

/** Pre-order walk; return false from the visitor to skip a subtree */
export function walkTree(node: ParseNode, visit: (node: ParseNode, parent: ParseNode | null) => boolean | void): void {
    const step = (current: ParseNode, parent: ParseNode | null) => {
        if (visit(current, parent) === false) return;
        for (const child of current.children) {
            if (isNode(child)) step(child, current);
        }
    };
    step(node, null);
}

export function findDescendant(node: ParseNode, predicate: (node: ParseNode) => boolean): ParseNode | null {
    const pending: ParseNode[] = node.children.filter(isNode).reverse();
    while (pending.length > 0) {
        const current = pending.pop();
        if (!current) break;
        if (predicate(current)) return current;
        for (let i = current.children.length - 1; i >= 0; i--) {
            const child = current.children[i];
            if (isNode(child)) pending.push(child);
        }
    }
    return null;
}

export function hasDescendant(node: ParseNode, predicate: (node: ParseNode) => boolean): boolean {
    return findDescendant(node, predicate) !== null;
}

export function treeWords(node: ParseNode): string[] {
    const words: string[] = [];
    const collect = (current: ParseNode) => {
        for (const child of current.children) {
            if (isNode(child)) collect(child);
            else words.push(child);
        }
    };
    collect(node);
    return words;
}

export function renderTree(node: ParseNode): string {
    const parts = node.children.map(child => (isNode(child) ? renderTree(child) : child));
    return `(${node.label} ${parts.join(' ')})`;
}
