/**
 * ActorDictionary - compiles actor phrase files into an ActorTable
 *
 * Format:
 *   FRANCE [FRA]                 primary phrase with its default code
 *   +FRENCH_REPUBLIC             synonym of the preceding primary
 *   \t[IRQ <19990101]            date restriction: before (inclusive)
 *   \t[IRQ >20030101]            date restriction: after (inclusive)
 *   \t[IRQ 19990101-20021231]    date restriction: closed interval
 *   \t[IRQ]                      replacement default code
 *   ---STOP---                   ignore the rest of the file
 *
 * Uncoded primaries share the code slot of the next coded entry.
 */

import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { CoderError } from '@/lib/core/errors';
import { WarningCollector, parsePhrase, readDictionaryLines } from './DictionaryReader';
import { toOrdinalDate } from './ordinalDate';
import type { ActorCodeSlot, ActorCodeVariant, ActorPattern, ActorTable } from './types';

export const UNRESOLVED_CODE = '---';

const DATE_ERROR = 'String in date restriction could not be interpreted; line skipped';

export interface ActorCompileOptions {
    bus?: CoderEventBus;
}

function parseDate(text: string): number | null {
    try {
        return toOrdinalDate(text);
    } catch (error) {
        if (error instanceof CoderError && error.code === 'invalid_date') return null;
        throw error;
    }
}

function stripComment(text: string): string {
    const semi = text.indexOf(';');
    return semi >= 0 ? text.slice(0, semi) : text;
}

function parseRestriction(text: string): ActorCodeVariant | string {
    const bracket = text.indexOf('[');
    if (bracket < 0) return DATE_ERROR;

    const inner = text.slice(bracket + 1).trim();
    const space = inner.indexOf(' ');
    const code = (space < 0 ? inner : inner.slice(0, space)).replace(/\].*$/, '').toUpperCase();
    const rest = space < 0 ? '' : inner.slice(space + 1).trimStart();

    if (rest.includes('<') || rest.includes('>')) {
        const digits = /\d{6,}/.exec(rest);
        const date = digits ? parseDate(digits[0]) : null;
        if (date === null) return DATE_ERROR;
        return rest.startsWith('<')
            ? { kind: 'before', date, code }
            : { kind: 'after', date, code };
    }

    if (rest.includes('-')) {
        const [from, to] = rest.replace(/\].*$/, '').split('-', 2);
        const start = parseDate(from.trim());
        const end = parseDate((to ?? '').trim());
        if (start === null || end === null) return DATE_ERROR;
        if (end < start) {
            return 'End date in interval date restriction is less than starting date; line skipped';
        }
        return { kind: 'interval', start, end, code };
    }

    if (code.length === 0) return 'Empty code in restriction; line skipped';
    return { kind: 'default', code };
}

class ActorTableBuilder {
    readonly patterns = new Map<string, ActorPattern[]>();
    readonly codes: ActorCodeSlot[] = [];

    private variants: ActorCodeVariant[] = [];
    private root = '';
    private slot = 0;
    private unsaved = false;

    constructor(private collector: WarningCollector) { }

    compileFile(source: string): void {
        this.slot = this.codes.length;
        this.variants = [];
        this.unsaved = false;

        for (const { text, line } of readDictionaryLines(source)) {
            if (text.includes('---STOP---')) break;

            if (/^[\t ]/.test(text)) {
                const restriction = parseRestriction(text);
                if (typeof restriction === 'string') {
                    this.collector.warn(line, restriction);
                } else {
                    this.variants.push(restriction);
                    this.unsaved = true;
                }
                continue;
            }

            let phrase: string;
            if (text.startsWith('+')) {
                phrase = stripComment(text.slice(1));
            } else {
                if (this.variants.length > 0) this.saveSlot();
                const bracket = text.indexOf('[');
                if (bracket >= 0) {
                    const close = text.indexOf(']', bracket);
                    const code = text.slice(bracket + 1, close < 0 ? undefined : close).trim().toUpperCase();
                    this.variants.push({ kind: 'default', code });
                    phrase = text.slice(0, bracket);
                } else {
                    phrase = stripComment(text);
                }
                this.root = phrase.trim().toUpperCase();
            }

            this.addPattern(phrase.toUpperCase(), line);
        }

        if (this.unsaved) this.saveSlot();
    }

    private addPattern(text: string, line: number): void {
        const { words, connectors } = parsePhrase(text);
        if (words.length === 0) {
            this.collector.warn(line, 'Empty actor phrase; line skipped');
            return;
        }
        const list = this.patterns.get(words[0]) ?? [];
        list.push({ words, connectors, slot: this.slot });
        this.patterns.set(words[0], list);
        this.unsaved = true;
    }

    private saveSlot(): void {
        this.codes.push({ variants: this.variants, root: this.root });
        this.slot = this.codes.length;
        this.variants = [];
        this.unsaved = false;
    }

    build(): Omit<ActorTable, 'warnings'> {
        for (const list of this.patterns.values()) {
            list.sort((a, b) => b.words.length - a.words.length);
        }
        return { patterns: this.patterns, codes: this.codes };
    }
}

export function compileActorDictionary(
    sources: string | string[],
    options: ActorCompileOptions = {}
): ActorTable {
    const collector = new WarningCollector('actor', options.bus ?? coderEventBus);
    const builder = new ActorTableBuilder(collector);
    for (const source of Array.isArray(sources) ? sources : [sources]) {
        builder.compileFile(source);
    }
    return { ...builder.build(), warnings: collector.warnings };
}

/**
 * Pick the code for a slot on a given ordinal date: the first date
 * restriction that holds wins, otherwise the last unrestricted code.
 */
export function resolveActorCode(slot: ActorCodeSlot | undefined, ordinalDate: number): string {
    if (!slot) return UNRESOLVED_CODE;

    for (const variant of slot.variants) {
        switch (variant.kind) {
            case 'before':
                if (ordinalDate <= variant.date) return variant.code;
                break;
            case 'after':
                if (ordinalDate >= variant.date) return variant.code;
                break;
            case 'interval':
                if (ordinalDate >= variant.start && ordinalDate <= variant.end) return variant.code;
                break;
            case 'default':
                break;
        }
    }

    let fallback: string = UNRESOLVED_CODE;
    for (const variant of slot.variants) {
        if (variant.kind === 'default') fallback = variant.code;
    }
    return fallback;
}
