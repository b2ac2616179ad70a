import { CoderEventBus } from '@/lib/core/CoderEventBus';
import { compileActorDictionary } from '@/lib/dictionaries/ActorDictionary';
import { compileAgentDictionary } from '@/lib/dictionaries/AgentDictionary';
import { compileDiscardList } from '@/lib/dictionaries/DiscardList';
import { compileIssueList } from '@/lib/dictionaries/IssueList';
import { compileVerbDictionary } from '@/lib/dictionaries/VerbDictionary';
import type { CoderDictionaries } from '@/lib/dictionaries/types';

// Small in-memory dictionaries shared by the coding and validation tests

export const TEST_VERBS = `
&WEAPON
+MISSILE
+ROCKET

--- ATTACK [190] ---
ATTACK
- $ * _&WEAPON [195]
- * AGAINST + [193]

--- MEET [040] ---
MEET {MET MEETS MEETING}
- $ * WITH + [043:044]

--- ACCUSE [---] ---
ACCUSE
- * OF_LYING [---]
- * + [112]

--- CARRY [---] ---
CARRY
+CARRY_OUT [180]
`;

export const TEST_ACTORS = `
FRANCE [FRA]
+FRENCH_REPUBLIC
GERMANY [GMY]
ITALY [ITA]
UNITED_STATES [USA]
UNITED_STATES_SENATE [USALEG]
`;

export const TEST_AGENTS = `
POLICE [~COP]
MINISTER [~GOV]
REBEL [REB~]
`;

export const TEST_DISCARDS = `
SOCCER
+CROSSWORD # puzzle pages
`;

export const TEST_ISSUES = `
NUCLEAR+WEAPON [NUC]
`;

export function buildTestDictionaries(bus: CoderEventBus = new CoderEventBus()): CoderDictionaries {
    return {
        verbs: compileVerbDictionary(TEST_VERBS, { bus }),
        actors: compileActorDictionary(TEST_ACTORS, { bus }),
        agents: compileAgentDictionary(TEST_AGENTS, { bus }),
        discards: compileDiscardList(TEST_DISCARDS),
        issues: compileIssueList(TEST_ISSUES),
    };
}
