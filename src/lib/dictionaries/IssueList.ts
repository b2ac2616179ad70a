/**
 * Issue phrases: `phrase [CODE]` lines tag sentences with issue codes.
 *
 * Expansion shorthands apply to the word that follows them:
 *   n:  adds the plural
 *   v:  adds the regular verb forms
 *   +   (between words) gives a blank and a hyphenated variant
 * Lines starting `~` (sentence) or `~~` (story) are ignore phrases: any match
 * cancels every issue in the sentence.
 */

import { readDictionaryLines, stripInlineComment } from './DictionaryReader';
import { makePlural, makeVerbForms } from './wordForms';
import type { IssuePhrase, IssueTable } from './types';

function normalize(text: string): string {
    return text.split(/\s+/).filter(word => word.length > 0).join(' ');
}

function splitAfterMarker(form: string, marker: string): { before: string; word: string; rest: string } {
    const at = form.indexOf(marker);
    const before = form.slice(0, at);
    const tail = form.slice(at + marker.length);
    const space = tail.indexOf(' ');
    return {
        before,
        word: space < 0 ? tail : tail.slice(0, space),
        rest: space < 0 ? '' : tail.slice(space),
    };
}

export function expandIssueForms(target: string): string[] {
    const forms = [target];
    let changed = true;

    while (changed) {
        changed = false;
        for (let i = 0; i < forms.length; i++) {
            const form = forms[i];
            if (form.includes('+')) {
                forms[i] = form.replace('+', ' ');
                forms.splice(i + 1, 0, form.replace('+', '-'));
                changed = true;
            } else if (form.includes('N:')) {
                const { before, word, rest } = splitAfterMarker(form, 'N:');
                forms[i] = before + word + rest;
                forms.splice(i + 1, 0, before + makePlural(word) + rest);
                changed = true;
            } else if (form.includes('V:')) {
                const { before, word, rest } = splitAfterMarker(form, 'V:');
                forms[i] = before + word + rest;
                forms.splice(i + 1, 0, ...makeVerbForms(word).map(verbForm => before + verbForm + rest));
                changed = true;
            }
        }
    }

    return forms.map(normalize);
}

export function compileIssueList(source: string): IssueTable {
    const phrases: IssuePhrase[] = [];
    const codes: string[] = [];

    for (const { text } of readDictionaryLines(source)) {
        const line = stripInlineComment(text).trim().toUpperCase();
        if (line.length === 0) continue;

        if (line.startsWith('~')) {
            const code = line.startsWith('~~') ? '~~' : '~';
            const target = line.slice(code.length).trim();
            for (const form of expandIssueForms(target)) {
                phrases.push({ phrase: ` ${form} `, code, ignore: true });
            }
            continue;
        }

        const bracket = line.indexOf('[');
        if (bracket < 0) continue;
        const close = line.indexOf(']', bracket);
        const code = line.slice(bracket + 1, close < 0 ? undefined : close).trim();
        if (!codes.includes(code)) codes.push(code);

        for (const form of expandIssueForms(line.slice(0, bracket).trim())) {
            phrases.push({ phrase: ` ${form} `, code, ignore: false });
        }
    }

    return { phrases, codes };
}

/** Issue codes with match counts, in first-seen order */
export function findIssues(text: string, table: IssueTable | undefined): Array<[string, number]> {
    if (!table) return [];
    const padded = ` ${text.toUpperCase()} `;
    const counts: Array<[string, number]> = [];

    for (const entry of table.phrases) {
        if (!padded.includes(entry.phrase)) continue;
        if (entry.ignore) return [];
        const existing = counts.find(([code]) => code === entry.code);
        if (existing) existing[1] += 1;
        else counts.push([entry.code, 1]);
    }

    return counts;
}
