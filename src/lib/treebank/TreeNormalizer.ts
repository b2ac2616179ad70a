/**
 * TreeNormalizer - bracketed parse → flat token sequence
 *
 * Noun phrases collapse into entity spans (NE), coordinated noun phrases
 * into compounds (NEC) with one entity per head, subordinate clauses inside
 * noun phrases into plain word runs (SBR). NP, VP and NEC markers get
 * occurrence indexes so sibling phrases can be told apart.
 */

import { fail, ok, type CodingFailure, type CodingResult, type FailureTag } from '@/lib/core/errors';
import { UNRESOLVED_CODE } from '@/lib/dictionaries/ActorDictionary';
import {
    findDescendant,
    hasDescendant,
    isNode,
    parseBracketedTree,
    treeWords,
    walkTree,
    type ParseChild,
    type ParseNode,
} from './parseTree';
import { isBalanced, isOpening, type Token } from './tokens';

// ==================== COMPOUND MARKING ====================

function subtreeLabels(node: ParseNode): string[] {
    const labels: string[] = [];
    walkTree(node, current => {
        labels.push(current.label);
    });
    return labels;
}

/**
 * Classify every coordination: inside a verb or clause phrase, or next to
 * another coordination, the CC becomes CCP; a noun phrase with at least
 * three noun labels becomes NEC.
 */
export function markCompounds(root: ParseNode): void {
    const coordinations: Array<{ cc: ParseNode; parent: ParseNode }> = [];
    walkTree(root, (node, parent) => {
        if (parent && node.label.startsWith('CC')) coordinations.push({ cc: node, parent });
    });

    for (const { cc, parent } of coordinations) {
        const labels = subtreeLabels(parent);
        if (labels.some(label => label.startsWith('VP') || label.startsWith('S'))) {
            cc.label = 'CCP';
        } else if (labels.filter(label => label.startsWith('CC')).length > 1) {
            cc.label = 'CCP';
        } else if (parent.label === 'NP' && labels.filter(label => label.startsWith('N')).length >= 3) {
            parent.label = 'NEC';
        }
    }
}

function reduceSubordinateClauses(node: ParseNode): void {
    node.children = node.children.map(child => {
        if (!isNode(child)) return child;
        if (child.label === 'SBAR') return { label: 'SBR', children: treeWords(child) };
        reduceSubordinateClauses(child);
        return child;
    });
}

interface PreorderEntry {
    node: ParseNode;
    /** Pre-order position of the last node in this subtree */
    exit: number;
}

function preorder(node: ParseNode): PreorderEntry[] {
    const entries: PreorderEntry[] = [];
    const visit = (current: ParseNode) => {
        const position = entries.length;
        entries.push({ node: current, exit: position });
        for (const child of current.children) {
            if (isNode(child)) visit(child);
        }
        entries[position].exit = entries.length - 1;
    };
    for (const child of node.children) {
        if (isNode(child)) visit(child);
    }
    return entries;
}

function findParent(root: ParseNode, target: ParseNode): ParseNode | null {
    let found: ParseNode | null = null;
    walkTree(root, (node, parent) => {
        if (found !== null) return false;
        if (node === target) {
            found = parent;
            return false;
        }
        return true;
    });
    return found;
}

// ==================== NORMALIZER ====================

export class TreeNormalizer {
    private npIndex = 1;
    private vpIndex = 1;
    private compoundIndex = 1;
    private failure: CodingFailure | null = null;

    constructor(private sentenceId?: string) { }

    normalize(parse: string): CodingResult<Token[]> {
        const tree = parseBracketedTree(parse, this.sentenceId);
        if (!tree.success) return tree;

        markCompounds(tree.value);

        const tokens: Token[] = [];
        this.emit(tree.value, tokens);
        if (this.failure) return { success: false, failure: this.failure };

        const [first, second, third] = tokens.filter(isOpening);
        if (
            first?.kind === 'open' && first.label === 'ROOT' &&
            second?.kind === 'entity-open' &&
            third?.kind === 'compound-open'
        ) {
            return fail('dateline', 'Dateline pattern found in token sequence', this.sentenceId);
        }

        if (!isBalanced(tokens)) {
            return fail('bad_final_parse', 'Token sequence unbalanced after normalization', this.sentenceId);
        }
        return ok(tokens);
    }

    private abort(tag: FailureTag, message: string): void {
        if (!this.failure) this.failure = { tag, message, sentenceId: this.sentenceId };
    }

    private emit(node: ParseNode, out: Token[]): void {
        if (node.label === 'NP') {
            this.emitNounPhrase(node, out);
        } else if (node.label === 'NEC') {
            this.emitCompound(node, out);
        } else if (node.label === 'VP') {
            const index = this.vpIndex++;
            out.push({ kind: 'open', label: 'VP', index });
            this.emitChildren(node.children, out);
            out.push({ kind: 'close', label: 'VP', index });
        } else {
            out.push({ kind: 'open', label: node.label });
            this.emitChildren(node.children, out);
            out.push({ kind: 'close', label: node.label });
        }
    }

    private emitChildren(children: ParseChild[], out: Token[]): void {
        for (const child of children) {
            if (isNode(child)) this.emit(child, out);
            else out.push({ kind: 'word', text: child });
        }
    }

    private emitNounPhrase(np: ParseNode, out: Token[]): void {
        reduceSubordinateClauses(np);

        if (hasDescendant(np, node => node.label.startsWith('POS'))) {
            this.pushEntity(np.children, out, node => node.label.startsWith('POS'));
            return;
        }

        const pp = findDescendant(np, node => node.label.startsWith('PP'));
        if (pp) {
            const parent = findParent(np, pp);
            const parts = parent ? this.prepositionParts(parent) : null;
            if (parts) {
                this.pushEntity(parts, out);
                return;
            }
        } else if (!hasDescendant(np, node => node.label.startsWith('NP') || node.label.startsWith('NEC'))) {
            this.pushEntity(np.children, out);
            return;
        }

        const index = this.npIndex++;
        out.push({ kind: 'open', label: 'NP', index });
        this.emitChildren(np.children, out);
        out.push({ kind: 'close', label: 'NP', index });
    }

    /**
     * Flatten `(NP (NP|NEC ...) (PP (IN ...) (NP|NEC ...)))` into one entity.
     * Any other shape, or a second preposition inside the object, returns null.
     */
    private prepositionParts(parent: ParseNode): ParseChild[] | null {
        const head = parent.children[0];
        if (parent.label !== 'NP' || head === undefined || !isNode(head)) return null;
        if (head.label !== 'NP' && head.label !== 'NEC') return null;

        const entries = preorder(parent);
        const headEnd = entries[0].exit;

        const prepAt = entries.findIndex((entry, i) => i > headEnd && entry.node.label === 'IN');
        if (prepAt < 0) return null;

        const objectAt = entries.findIndex(
            (entry, i) => i > prepAt && (entry.node.label === 'NP' || entry.node.label === 'NEC')
        );
        if (objectAt < 0) return null;
        const object = entries[objectAt].node;
        if (hasDescendant(object, node => node.label.startsWith('PP'))) return null;

        const parts: ParseChild[] = head.label === 'NEC' ? [head] : [...head.children];
        parts.push(...entries[prepAt].node.children);
        if (object.label === 'NEC') parts.push(object);
        else parts.push(...object.children);

        const clause = entries.find((entry, i) => i > entries[objectAt].exit && entry.node.label === 'SBR');
        if (clause) parts.push(clause.node);
        return parts;
    }

    private pushEntity(children: ParseChild[], out: Token[], skip?: (node: ParseNode) => boolean): void {
        const body: Token[] = [];
        this.collectEntityContent(children, body, skip);
        if (!body.some(token => token.kind === 'word')) {
            this.abort('empty_nplist', 'Noun phrase produced an entity without words');
            return;
        }
        out.push({ kind: 'entity-open', code: UNRESOLVED_CODE }, ...body, { kind: 'entity-close' });
    }

    private collectEntityContent(children: ParseChild[], out: Token[], skip?: (node: ParseNode) => boolean): void {
        for (const child of children) {
            if (!isNode(child)) {
                out.push({ kind: 'word', text: child });
            } else if (child.label.startsWith('NEC')) {
                this.pushNestedCompound(child, out);
            } else if (!skip?.(child)) {
                this.collectEntityContent(child.children, out, skip);
            }
        }
    }

    /** A compound inside an entity keeps one marked-up member per noun child */
    private pushNestedCompound(nec: ParseNode, out: Token[]): void {
        const index = this.compoundIndex++;
        out.push({ kind: 'compound-open', index });
        for (const child of nec.children) {
            if (!isNode(child) || !child.label.startsWith('N')) continue;
            if (child.label.startsWith('NEC')) {
                this.pushNestedCompound(child, out);
                continue;
            }
            out.push({ kind: 'open', label: child.label });
            this.collectEntityContent(child.children, out);
            out.push({ kind: 'close', label: child.label });
        }
        out.push({ kind: 'compound-close', index });
    }

    /**
     * Top-level compound: one entity per noun head. Adjectives before the
     * first head are copied onto every single-noun head.
     */
    private emitCompound(nec: ParseNode, out: Token[]): void {
        const index = this.compoundIndex++;
        const adjectives: string[] = [];
        const members: Token[] = [];
        let seenHead = false;
        let memberCount = 0;

        const visit = (node: ParseNode) => {
            if (node.label.startsWith('NP') || node.label.startsWith('NN')) {
                seenHead = true;
                memberCount++;
                if (node.label.startsWith('NN')) {
                    const words = treeWords(node).slice(0, 1);
                    this.pushEntity([...adjectives, ...words], members);
                } else {
                    this.pushEntity(node.children, members);
                }
                return;
            }
            if (!seenHead && node.label.startsWith('JJ')) {
                adjectives.push(...treeWords(node));
                return;
            }
            for (const child of node.children) {
                if (isNode(child)) visit(child);
            }
        };
        for (const child of nec.children) {
            if (isNode(child)) visit(child);
        }

        if (memberCount === 0) {
            this.abort('resolve_compounds', 'Compound noun phrase without noun heads');
            return;
        }
        out.push({ kind: 'compound-open', index }, ...members, { kind: 'compound-close', index });
    }
}

export function normalizeTree(parse: string, sentenceId?: string): CodingResult<Token[]> {
    return new TreeNormalizer(sentenceId).normalize(parse);
}
