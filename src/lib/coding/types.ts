/**
 * Coding types shared by the resolver, the verb engine and the assembler
 */

// ==================== OUTPUT ====================

export interface CodedEvent {
    source: string;
    target: string;
    eventCode: string;
    /** Present when root annotations are switched on */
    sourceRoot?: string;
    targetRoot?: string;
    /** Present when text annotations are switched on */
    sourceText?: string;
    targetText?: string;
}

// ==================== CONTEXT SEQUENCES ====================

export type SequenceSide = 'upper' | 'lower';

/**
 * One element of an upper or lower sequence. Phrase markers other than
 * entity and compound markers are dropped; `tokenIndex` points back into
 * the sentence tokens.
 */
export type ContextItem =
    | { kind: 'entity-open'; tokenIndex: number; code: string }
    | { kind: 'entity-close'; tokenIndex: number }
    | { kind: 'compound-open'; tokenIndex: number }
    | { kind: 'compound-close'; tokenIndex: number }
    | { kind: 'word'; tokenIndex: number; text: string };

export interface ContextSequences {
    /** Walks away from the verb: nearest token first */
    upper: ContextItem[];
    lower: ContextItem[];
}

/** Where a pattern (or the default rules) placed the source or target */
export interface Locator {
    side: SequenceSide;
    /** Position in the side's sequence */
    position: number;
    /** Entity-open or compound-open token in the sentence */
    tokenIndex: number;
}

export interface Locators {
    source: Locator | null;
    target: Locator | null;
}

/** A code taken from a located entity, with its annotations */
export interface LocatedCode {
    code: string;
    root: string;
    text: string;
}
