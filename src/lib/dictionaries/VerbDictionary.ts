/**
 * VerbDictionary - compiles verb pattern files into a VerbTable
 *
 * Format:
 *   --- ATTACK [190] ---        block header; the code is the block default
 *   ATTACK                      first verb of a block: the primary entry
 *   ASSAULT [193]               further verbs redirect to the primary
 *   SEIZE {SEIZED SEIZING}      explicit forms replace generated ones
 *   +CARRY_OUT                  multi-word verb keyed on CARRY
 *   - $ * + [191]               pattern: upper * lower [code]
 *   &CURRENCY                   synonym set; members on `+` lines
 *   +DOLLAR
 *
 * Patterns attach to the primary verb of the current block and are tried
 * in file order.
 */

import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { WarningCollector, readDictionaryLines, type DictionaryLine } from './DictionaryReader';
import { makePlural, makeVerbForms } from './wordForms';
import type {
    Connector,
    MultiWordVerb,
    PatternAtom,
    PatternStep,
    PrimaryVerbEntry,
    VerbEntry,
    VerbPattern,
    VerbTable,
} from './types';

export const NULL_CODE = '---';

export interface VerbCompileOptions {
    bus?: CoderEventBus;
}

interface RawStep {
    word: string;
    after: Connector;
}

function splitPatternText(text: string): RawStep[] {
    const steps: RawStep[] = [];
    let current = '';
    for (const ch of text) {
        if (ch === ' ' || ch === '_') {
            steps.push({ word: current, after: ch });
            current = '';
        } else {
            current += ch;
        }
    }
    if (current.length > 0) steps.push({ word: current, after: ' ' });
    return steps;
}

function toAtom(word: string): PatternAtom {
    switch (word) {
        case '$': return { kind: 'source' };
        case '+': return { kind: 'target' };
        case '^': return { kind: 'skip-entity' };
        case '%': return { kind: 'compound' };
        default:
            return word.startsWith('&') ? { kind: 'synset', name: word } : { kind: 'literal', word };
    }
}

/** Upper side: reversed so the word nearest the verb comes first */
export function compileUpperPattern(text: string): PatternStep[] {
    return splitPatternText(text.trimStart())
        .reverse()
        .filter(step => step.word.length > 0)
        .map(step => ({ connector: step.after, atom: toAtom(step.word) }));
}

/** Lower side: the leading character is the connector to the verb */
export function compileLowerPattern(text: string): PatternStep[] {
    const trimmed = text.trimEnd();
    if (trimmed.length === 0) return [];

    let first: Connector = ' ';
    let rest = trimmed;
    if (trimmed[0] === ' ' || trimmed[0] === '_') {
        first = trimmed[0];
        rest = trimmed.slice(1);
    }

    const raw = splitPatternText(rest);
    const steps: PatternStep[] = [];
    raw.forEach((step, i) => {
        if (step.word.length === 0) return;
        steps.push({ connector: i === 0 ? first : raw[i - 1].after, atom: toAtom(step.word) });
    });
    return steps;
}

class VerbTableBuilder {
    readonly verbs = new Map<string, VerbEntry>();
    readonly synsets = new Map<string, string[][]>();

    // Primaries created only to carry a multi-word continuation
    private holders = new Set<string>();
    private blockCode = NULL_CODE;
    private newBlock = false;
    private current: string | null = null;

    constructor(private collector: WarningCollector) { }

    compile(lines: DictionaryLine[]): void {
        for (let i = 0; i < lines.length; i++) {
            const { text, line } = lines[i];
            let verb: string;
            let code = '';
            const bracket = text.indexOf('[');
            if (bracket >= 0) {
                verb = text.slice(0, bracket).trim();
                const close = text.indexOf(']', bracket);
                code = text.slice(bracket + 1, close < 0 ? undefined : close).trim();
            } else {
                verb = text.trim();
            }

            if (verb.startsWith('---')) {
                this.blockCode = code.length > 0 ? code : NULL_CODE;
                this.newBlock = true;
            } else if (verb.startsWith('-')) {
                this.addPattern(verb, code, line);
            } else if (verb.startsWith('&')) {
                const members: DictionaryLine[] = [];
                while (i + 1 < lines.length && lines[i + 1].text.trimStart().startsWith('+')) {
                    members.push(lines[++i]);
                }
                this.addSynset(verb, members);
            } else if (verb.startsWith('+') && !verb.includes('_')) {
                this.collector.warn(line, 'Synonym set member outside a set; line skipped');
            } else {
                this.addVerb(verb, code.length > 0 ? code : this.blockCode, line);
            }
        }
    }

    private addVerb(verb: string, code: string, line: number): void {
        const brace = verb.indexOf('{');
        const base = brace >= 0 ? verb.slice(0, brace).trim() : verb;

        if (this.newBlock || this.current === null) {
            this.setPrimary(base, code, line);
            this.newBlock = false;
        }

        if (verb.includes('_')) {
            this.addMultiWord(verb, code, line);
        } else if (brace >= 0) {
            const end = verb.indexOf('}', brace);
            if (end < 0) {
                this.collector.warn(line, "Missing '}' in verb forms; line skipped");
                return;
            }
            const forms = verb.slice(brace + 1, end).split(/\s+/).filter(form => form.length > 0);
            for (const form of [base, ...forms]) this.setRedirect(form, code);
        } else {
            for (const form of [verb, ...makeVerbForms(verb)]) this.setRedirect(form, code);
        }
    }

    private setPrimary(key: string, code: string, line: number): void {
        const existing = this.verbs.get(key);
        this.current = key;
        if (existing?.kind === 'primary' && !this.holders.has(key)) {
            this.collector.warn(line, `Verb ${key} already has a primary entry; patterns are added to it`);
            return;
        }
        this.holders.delete(key);
        this.verbs.set(key, {
            kind: 'primary',
            code,
            multiWords: existing?.multiWords ?? [],
            patterns: existing?.kind === 'primary' ? existing.patterns : [],
        });
    }

    private setRedirect(word: string, code: string): void {
        if (this.current === null) return;
        const existing = this.verbs.get(word);
        if (existing?.kind === 'primary' && !this.holders.has(word)) return;
        this.holders.delete(word);
        this.verbs.set(word, {
            kind: 'redirect',
            code,
            primary: this.current,
            multiWords: existing?.multiWords ?? [],
        });
    }

    private addMultiWord(verb: string, code: string, line: number): void {
        if (this.current === null) return;
        const brace = verb.indexOf('{');
        const phrases = brace >= 0
            ? [...verb.slice(brace + 1, verb.indexOf('}', brace)).split(/\s+/), verb.slice(0, brace).trim()]
            : [verb];

        for (const phrase of phrases.filter(p => p.length > 0)) {
            const words = phrase.split('_').filter(word => word.length > 0);
            if (words.length < 2) {
                this.collector.warn(line, `Multi-word verb ${phrase} needs at least two words; skipped`);
                continue;
            }
            let multi: MultiWordVerb;
            let target: string;
            if (words[0].startsWith('+')) {
                target = words[0].slice(1);
                multi = { code, primary: this.current, after: true, words: words.slice(1) };
            } else if (words[words.length - 1].startsWith('+')) {
                target = words[words.length - 1].slice(1);
                multi = { code, primary: this.current, after: false, words: words.slice(0, -1).reverse() };
            } else {
                this.collector.warn(line, `Multi-word verb ${phrase} has no '+' on its first or last word; skipped`);
                continue;
            }

            const entry = this.verbs.get(target);
            if (entry) {
                entry.multiWords.push(multi);
            } else {
                this.verbs.set(target, { kind: 'primary', code: NULL_CODE, multiWords: [multi], patterns: [] });
                this.holders.add(target);
            }
        }
    }

    private addSynset(header: string, members: DictionaryLine[]): void {
        const noPlural = header.endsWith('_');
        const name = noPlural ? header.slice(0, -1) : header;
        const list: string[][] = [];

        for (const member of members) {
            const text = member.text.trim().slice(1).trim();
            const literal = noPlural || text.endsWith('_');
            const words = text.replace(/_/g, ' ').split(/\s+/).filter(word => word.length > 0);
            if (words.length === 0) continue;
            list.push(words);
            if (!literal) {
                list.push([...words.slice(0, -1), makePlural(words[words.length - 1])]);
            }
        }

        this.synsets.set(name, list);
    }

    private addPattern(verb: string, code: string, line: number): void {
        // Legacy brace patterns are not supported
        if (verb.includes('{')) return;

        const primary = this.currentPrimary();
        if (!primary) {
            this.collector.warn(line, 'Pattern found before any verb; skipped');
            return;
        }

        const body = (verb + ' ').replace(/_ /g, ' ').slice(1);
        const star = body.indexOf('*');
        const upper = compileUpperPattern(star < 0 ? body : body.slice(0, star));
        const lower = compileLowerPattern(star < 0 ? '' : body.slice(star + 1));

        for (const step of [...upper, ...lower]) {
            if (step.atom.kind === 'synset' && !this.synsets.has(step.atom.name)) {
                this.collector.warn(line, `Synset ${step.atom.name} has not been defined; pattern skipped`);
                return;
            }
        }

        const pattern: VerbPattern = {
            upper,
            lower,
            code: code.length > 0 ? code : primary.code,
            line,
        };
        primary.patterns.push(pattern);
    }

    private currentPrimary(): PrimaryVerbEntry | undefined {
        if (this.current === null) return undefined;
        const entry = this.verbs.get(this.current);
        return entry?.kind === 'primary' ? entry : undefined;
    }
}

export function compileVerbDictionary(source: string, options: VerbCompileOptions = {}): VerbTable {
    const collector = new WarningCollector('verb', options.bus ?? coderEventBus);
    const builder = new VerbTableBuilder(collector);
    const lines = readDictionaryLines(source).map(entry => ({ ...entry, text: entry.text.toUpperCase() }));
    builder.compile(lines);
    return { verbs: builder.verbs, synsets: builder.synsets, warnings: collector.warnings };
}

/** Follow a redirect to the entry holding the patterns */
export function primaryEntryFor(table: VerbTable, key: string): PrimaryVerbEntry | undefined {
    const entry = table.verbs.get(key);
    if (!entry) return undefined;
    if (entry.kind === 'primary') return entry;
    const target = table.verbs.get(entry.primary);
    return target?.kind === 'primary' ? target : undefined;
}
