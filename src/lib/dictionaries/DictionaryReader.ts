/**
 * Line reader shared by all dictionary compilers.
 *
 * Skips blank lines, `#` lines and XML comments, strips trailing ` #`
 * comments and keeps leading whitespace (actor date restrictions are
 * tab-indented).
 */

import { coderEventBus, type CoderEventBus, type DictionaryWarning } from '@/lib/core/CoderEventBus';
import type { Connector, PhrasePattern } from './types';

export interface DictionaryLine {
    text: string;
    line: number;
}

export function readDictionaryLines(source: string): DictionaryLine[] {
    const rawLines = source.split(/\r?\n/);
    const lines: DictionaryLine[] = [];
    let inComment = false;

    for (let i = 0; i < rawLines.length; i++) {
        let text = rawLines[i];

        if (inComment) {
            if (text.includes('-->')) inComment = false;
            continue;
        }
        if (text.startsWith('#') || text.trim().length === 0) continue;

        const open = text.indexOf('<!--');
        if (open >= 0) {
            const close = text.indexOf('-->', open + 4);
            if (close >= 0) {
                text = text.slice(0, open) + text.slice(close + 3);
            } else {
                inComment = true;
                text = text.slice(0, open);
            }
        } else if (text.startsWith('<!')) {
            continue;
        }

        const comment = text.lastIndexOf(' #');
        if (comment >= 0) text = text.slice(0, comment);

        text = text.trimEnd();
        if (text.trim().length === 0) continue;
        lines.push({ text, line: i + 1 });
    }

    return lines;
}

/** Drop everything from the first `#` on (discard and issue lists) */
export function stripInlineComment(text: string): string {
    const hash = text.indexOf('#');
    return hash >= 0 ? text.slice(0, hash) : text;
}

/**
 * Split a phrase on blanks and underscores, remembering which separator
 * joined each pair of words. Empty words from doubled separators are dropped.
 */
export function parsePhrase(text: string): PhrasePattern {
    const words: string[] = [];
    const connectors: Connector[] = [];
    let pending: Connector = ' ';
    let current = '';

    const flush = (next: Connector) => {
        if (current.length > 0) {
            if (words.length > 0) connectors.push(pending);
            words.push(current);
            current = '';
            pending = next;
        } else if (next === '_') {
            pending = '_';
        }
    };

    for (const ch of text.trim()) {
        if (ch === ' ' || ch === '\t') flush(' ');
        else if (ch === '_') flush('_');
        else current += ch;
    }
    flush(' ');

    return { words, connectors };
}

/** Collects compile warnings, logs them and forwards them to the bus */
export class WarningCollector {
    readonly warnings: DictionaryWarning[] = [];

    constructor(
        private dictionary: DictionaryWarning['dictionary'],
        private bus: CoderEventBus = coderEventBus
    ) { }

    warn(line: number, message: string): void {
        const warning: DictionaryWarning = { dictionary: this.dictionary, line, message };
        this.warnings.push(warning);
        console.warn(`[Dictionary:${this.dictionary}] line ${line}: ${message}`);
        this.bus.emit('dictionary-warning', warning);
    }
}
