/**
 * AgentDictionary - compiles agent phrase files into an AgentTable
 *
 * Format:
 *   POLICE [~COP]                  code attached after the actor code
 *   OPPOSITION_LEADER [OPP~]       code attached before the actor code
 *   POLICEMAN {POLICEMEN} [~COP]   explicit plural; `{}` means none
 *   !minister! = MINISTER, SECRETARY
 *   FOREIGN !minister! [~GOV]      one entry per substitution member
 */

import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { WarningCollector, parsePhrase, readDictionaryLines } from './DictionaryReader';
import { makePlural } from './wordForms';
import type { AgentAttachment, AgentPattern, AgentTable } from './types';

const LINE_SKIPPED = ' in agents file; line skipped';

export interface AgentCompileOptions {
    bus?: CoderEventBus;
}

export function parseAgentCode(raw: string): { code: string; attach: AgentAttachment } {
    if (raw.startsWith('~')) return { code: raw.slice(1), attach: 'back' };
    if (raw.endsWith('~')) return { code: raw.slice(0, -1), attach: 'front' };
    return { code: raw, attach: 'back' };
}

export function compileAgentDictionary(source: string, options: AgentCompileOptions = {}): AgentTable {
    const collector = new WarningCollector('agent', options.bus ?? coderEventBus);
    const patterns = new Map<string, AgentPattern[]>();
    const substitutions = new Map<string, string[]>();

    const store = (phrase: string, rawCode: string) => {
        const { words, connectors } = parsePhrase(phrase);
        if (words.length === 0) return;
        const list = patterns.get(words[0]) ?? [];
        list.push({ words, connectors, ...parseAgentCode(rawCode) });
        patterns.set(words[0], list);
    };

    for (const { text: rawText, line } of readDictionaryLines(source)) {
        const text = rawText.toUpperCase();

        if (text.includes('!') && text.includes('=')) {
            const first = text.indexOf('!');
            const second = text.indexOf('!', first + 1);
            const equals = text.indexOf('=', first);
            if (second < 0 || equals < 0) {
                collector.warn(line, 'Substitution marker incorrectly defined' + LINE_SKIPPED);
                continue;
            }
            const members = text
                .slice(equals + 1)
                .split(',')
                .map(item => item.trim())
                .filter(item => item.length > 0);
            substitutions.set(text.slice(first + 1, second), members);
            continue;
        }

        const bracket = text.indexOf('[');
        if (bracket < 0) {
            collector.warn(line, 'Codes are required for agents' + LINE_SKIPPED);
            continue;
        }
        const close = text.indexOf(']', bracket);
        const code = text.slice(bracket + 1, close < 0 ? undefined : close).trim();
        const phrase = text.slice(0, bracket).trim();

        if (phrase.includes('!')) {
            const first = phrase.indexOf('!');
            const second = phrase.indexOf('!', first + 1);
            if (second < 0) {
                collector.warn(line, 'Substitution marker syntax incorrect' + LINE_SKIPPED);
                continue;
            }
            const marker = phrase.slice(first + 1, second);
            const members = substitutions.get(marker);
            if (!members) {
                collector.warn(line, `Substitution marker !${marker}! missing` + LINE_SKIPPED);
                continue;
            }
            for (const member of members) {
                const expanded = phrase.slice(0, first) + member + phrase.slice(second + 1);
                store(expanded, code);
                store(makePlural(expanded), code);
            }
            continue;
        }

        let base = phrase;
        let plural: string;
        if (phrase.includes('{')) {
            const end = phrase.indexOf('}');
            if (end < 0) {
                collector.warn(line, "Missing '}'" + LINE_SKIPPED);
                continue;
            }
            base = phrase.slice(0, phrase.indexOf('{')).trim();
            plural = phrase.slice(phrase.indexOf('{') + 1, end).trim();
        } else {
            plural = makePlural(phrase);
        }

        store(base, code);
        if (plural.length > 0) store(plural, code);
    }

    for (const list of patterns.values()) {
        list.sort((a, b) => b.words.length - a.words.length);
    }

    return { patterns, warnings: collector.warnings };
}
