/**
 * Reads the dictionary files named in a CoderConfig and compiles them.
 * A missing verb, actor or agent file stops the load; discard and issue
 * files are optional.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import type { CoderConfig } from '@/lib/config/coderConfig';
import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { CoderError } from '@/lib/core/errors';
import { compileActorDictionary } from './ActorDictionary';
import { compileAgentDictionary } from './AgentDictionary';
import { compileDiscardList } from './DiscardList';
import { compileIssueList } from './IssueList';
import { compileVerbDictionary } from './VerbDictionary';
import type { CoderDictionaries } from './types';

type DictionaryFiles = Pick<
    CoderConfig,
    'dictionaryDir' | 'verbFile' | 'actorFiles' | 'agentFile' | 'discardFile' | 'issueFile'
>;

function resolvePath(dir: string, file: string): string {
    return isAbsolute(file) ? file : join(dir, file);
}

function readRequired(path: string, kind: string): string {
    if (!existsSync(path)) {
        throw new CoderError(`Required ${kind} dictionary ${path} was not found`, 'dictionary_missing', {
            path,
            kind,
        });
    }
    console.info(`[DictionaryLoader] Reading ${path}`);
    return readFileSync(path, 'utf8');
}

function readOptional(path: string | undefined): string | undefined {
    if (!path) return undefined;
    if (!existsSync(path)) {
        console.warn(`[DictionaryLoader] Optional file ${path} not found; skipped`);
        return undefined;
    }
    console.info(`[DictionaryLoader] Reading ${path}`);
    return readFileSync(path, 'utf8');
}

export function loadDictionaries(files: DictionaryFiles, bus: CoderEventBus = coderEventBus): CoderDictionaries {
    const dir = files.dictionaryDir;

    const verbs = compileVerbDictionary(readRequired(resolvePath(dir, files.verbFile), 'verb'), { bus });
    const actors = compileActorDictionary(
        files.actorFiles.map(file => readRequired(resolvePath(dir, file), 'actor')),
        { bus }
    );
    const agents = compileAgentDictionary(readRequired(resolvePath(dir, files.agentFile), 'agent'), { bus });

    const discardText = readOptional(files.discardFile && resolvePath(dir, files.discardFile));
    const issueText = readOptional(files.issueFile && resolvePath(dir, files.issueFile));

    const dictionaries: CoderDictionaries = {
        verbs,
        actors,
        agents,
        discards: discardText === undefined ? undefined : compileDiscardList(discardText),
        issues: issueText === undefined ? undefined : compileIssueList(issueText),
    };

    console.info(
        `[DictionaryLoader] Loaded ${verbs.verbs.size} verbs, ${actors.codes.length} actor entries, ` +
        `${agents.patterns.size} agent keywords`
    );
    return dictionaries;
}
