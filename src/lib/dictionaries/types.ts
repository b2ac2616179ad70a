/**
 * Compiled dictionary tables.
 * Built once at startup and never mutated afterwards.
 */

import type { DictionaryWarning } from '@/lib/core/CoderEventBus';

/** `' '` allows intervening words, `'_'` requires adjacency. */
export type Connector = ' ' | '_';

/**
 * A dictionary phrase. `connectors[i]` sits between `words[i]` and
 * `words[i + 1]`.
 */
export interface PhrasePattern {
    words: string[];
    connectors: Connector[];
}

// ==================== ACTORS ====================

export type ActorCodeVariant =
    | { kind: 'default'; code: string }
    | { kind: 'before'; date: number; code: string }
    | { kind: 'after'; date: number; code: string }
    | { kind: 'interval'; start: number; end: number; code: string };

export interface ActorCodeSlot {
    variants: ActorCodeVariant[];
    /** Primary phrase of the entry, used for root annotations */
    root: string;
}

export interface ActorPattern extends PhrasePattern {
    slot: number;
}

export interface ActorTable {
    /** Keyed on the first word; each list sorted longest phrase first */
    patterns: Map<string, ActorPattern[]>;
    codes: ActorCodeSlot[];
    warnings: DictionaryWarning[];
}

// ==================== AGENTS ====================

export type AgentAttachment = 'front' | 'back';

export interface AgentPattern extends PhrasePattern {
    code: string;
    attach: AgentAttachment;
}

export interface AgentTable {
    patterns: Map<string, AgentPattern[]>;
    warnings: DictionaryWarning[];
}

// ==================== VERBS ====================

export type PatternAtom =
    | { kind: 'literal'; word: string }
    | { kind: 'synset'; name: string }
    | { kind: 'source' }
    | { kind: 'target' }
    | { kind: 'skip-entity' }
    | { kind: 'compound' };

/** One pattern element; the connector governs the gap before the atom */
export interface PatternStep {
    connector: Connector;
    atom: PatternAtom;
}

export interface VerbPattern {
    /** Stored in walk order: nearest the verb first */
    upper: PatternStep[];
    lower: PatternStep[];
    code: string;
    line: number;
}

export interface MultiWordVerb {
    code: string;
    /** Key of the entry whose patterns apply after a match */
    primary: string;
    /** True when the extra words follow the verb */
    after: boolean;
    /** Nearest the verb first */
    words: string[];
}

export interface PrimaryVerbEntry {
    kind: 'primary';
    code: string;
    multiWords: MultiWordVerb[];
    patterns: VerbPattern[];
}

export interface RedirectVerbEntry {
    kind: 'redirect';
    code: string;
    primary: string;
    multiWords: MultiWordVerb[];
}

export type VerbEntry = PrimaryVerbEntry | RedirectVerbEntry;

export interface VerbTable {
    verbs: Map<string, VerbEntry>;
    /** Members are word sequences; single words are one-element arrays */
    synsets: Map<string, string[][]>;
    warnings: DictionaryWarning[];
}

// ==================== DISCARDS & ISSUES ====================

export interface DiscardPhrase {
    phrase: string;
    story: boolean;
    /** Trailing `_`: the match must end at a blank, `.`, `!`, `?` or end of text */
    wholeWord: boolean;
}

export interface DiscardList {
    phrases: DiscardPhrase[];
}

export interface IssuePhrase {
    /** Padded with a blank on both sides */
    phrase: string;
    code: string;
    /** `~` and `~~` phrases cancel every issue in the sentence */
    ignore: boolean;
}

export interface IssueTable {
    phrases: IssuePhrase[];
    codes: string[];
}

// ==================== BUNDLE ====================

export interface CoderDictionaries {
    verbs: VerbTable;
    actors: ActorTable;
    agents: AgentTable;
    discards?: DiscardList;
    issues?: IssueTable;
}
